import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { averageProcessingMs } from '../../application/index.js';

/**
 * Operational routes.
 *
 * GET /health   liveness probe
 * GET /metrics  engine counters and current queue depth
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  fastify.get('/metrics', async (_request, reply: FastifyReply) => {
    const metrics = fastify.engine.getMetrics();

    return reply.status(200).send({
      events_processed: metrics.events_processed,
      rules_evaluated: metrics.rules_evaluated,
      actions_executed: metrics.actions_executed,
      errors: metrics.errors,
      avg_processing_ms: averageProcessingMs(metrics),
      queue_size: fastify.eventQueue.size,
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
