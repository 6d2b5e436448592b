import Fastify, { type FastifyBaseLogger } from 'fastify';
import type { Logger } from 'pino';
import type { WebhookEvent } from './domain/index.js';
import type { RuleEngine } from './application/index.js';
import type { EventQueue } from './infrastructure/queue/event-queue.js';
import { enginePlugin, healthRoutes, webhookRoutes } from './interfaces/http/index.js';

export interface ServerDeps {
  readonly logger: Logger;
  readonly engine: RuleEngine;
  readonly queue: EventQueue<WebhookEvent>;
  readonly webhookPath: string;
  readonly secret?: string | undefined;
}

/**
 * Builds the Fastify app without listening, so tests can drive it with
 * `inject()`.
 */
export async function buildServer(deps: ServerDeps) {
  const loggerInstance: FastifyBaseLogger = deps.logger;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(enginePlugin, { engine: deps.engine, queue: deps.queue });
  await fastify.register(webhookRoutes, { path: deps.webhookPath, secret: deps.secret });
  await fastify.register(healthRoutes);

  return fastify;
}
