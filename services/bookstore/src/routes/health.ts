import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { HealthCheck } from '../contracts/bookStorage';
import { sendStatusText } from './respond';

// Liveness and readiness run the same database round trip.
export async function registerHealthRoutes(app: FastifyInstance, health: HealthCheck) {
  const probe = async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      await health.checkConnection();
    } catch (err) {
      req.log.error({ err }, 'Health check failed');
      return sendStatusText(reply, 500);
    }
    return sendStatusText(reply, 200);
  };

  app.get('/healthz', probe);
  app.get('/readyz', probe);
}
