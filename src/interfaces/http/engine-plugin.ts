import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { WebhookEvent } from '../../domain/index.js';
import type { RuleEngine } from '../../application/rule-engine.js';
import type { EventQueue } from '../../infrastructure/queue/event-queue.js';

export interface EnginePluginOptions {
  readonly engine: RuleEngine;
  readonly queue: EventQueue<WebhookEvent>;
}

/**
 * Decorates `fastify.engine` and `fastify.eventQueue` for the routes.
 * Both are created and owned by the bootstrap.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  fastify.decorate('engine', opts.engine);
  fastify.decorate('eventQueue', opts.queue);
}

export default fp(enginePlugin, {
  name: 'engine',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    engine: RuleEngine;
    eventQueue: EventQueue<WebhookEvent>;
  }
}
