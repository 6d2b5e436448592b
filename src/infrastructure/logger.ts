import pino, { type Logger } from 'pino';

/** Root logger shared by Fastify and the engine. */
export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: 'hookflow' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
