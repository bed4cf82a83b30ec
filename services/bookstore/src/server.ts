import Fastify, { type FastifyServerOptions, type HTTPMethods } from 'fastify';
import type { BookStorage, HealthCheck } from './contracts/bookStorage';
import { registerBookRoutes } from './routes/books';
import { registerHealthRoutes } from './routes/health';
import { sendStatusText, sendText } from './routes/respond';

const METHODS: HTTPMethods[] = ['DELETE', 'GET', 'OPTIONS', 'PATCH', 'POST', 'PUT'];

export interface AppDeps {
  books: BookStorage;
  health: HealthCheck;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logger ?? false,
    ignoreTrailingSlash: true,
  });

  // Bodies arrive raw whatever the content type; the books route decodes them.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.setNotFoundHandler((_req, reply) => sendText(reply, 404, '404 page not found'));

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err }, 'Unhandled request error');
    const status = err.statusCode && err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : 500;
    return sendStatusText(reply, status);
  });

  // url -> methods, so known paths can answer 405 instead of 404
  const allowed = new Map<string, Set<string>>();
  app.addHook('onRoute', (route) => {
    const methods = allowed.get(route.url) ?? new Set<string>();
    for (const method of [route.method].flat()) methods.add(method.toUpperCase());
    allowed.set(route.url, methods);
  });

  await registerHealthRoutes(app, deps.health);
  await registerBookRoutes(app, deps.books);

  for (const [url, methods] of [...allowed]) {
    const allow = [...methods].sort().join(', ');
    const others = METHODS.filter((m) => !methods.has(m));
    if (others.length === 0) continue;
    app.route({
      method: others,
      url,
      handler: (_req, reply) => sendStatusText(reply.header('Allow', allow), 405),
    });
  }
  return app;
}
