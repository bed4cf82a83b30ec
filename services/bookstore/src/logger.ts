import pino, { type DestinationStream, type LoggerOptions } from 'pino';

const loggerOptions = (level: string) =>
  ({
    level,
    base: { service: 'bookstore' },
  }) satisfies LoggerOptions;

/**
 * Process logger. Created before the HTTP server exists and then handed to
 * Fastify, so bootstrap and request logs come from one instance.
 */
export function createLogger(level: string, destination?: DestinationStream) {
  return destination ? pino(loggerOptions(level), destination) : pino(loggerOptions(level));
}
