import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ParseError, type WebhookEvent } from '../../domain/index.js';
import {
  DELIVERY_HEADER,
  SIGNATURE_HEADER,
  headerValue,
  parseEvent,
  verifySignature,
} from '../../application/index.js';

export interface WebhookRouteOptions {
  /** Route path, e.g. `/webhook`. */
  readonly path: string;
  /** Shared HMAC secret; signature checks are skipped when unset. */
  readonly secret?: string | undefined;
}

// Deliveries can carry up to 25 MB of JSON.
const MAX_BODY_BYTES = 25 * 1024 * 1024;

/**
 * Webhook ingestion route.
 *
 * POST <path>: verify signature, parse, enqueue, reply 200.
 *
 * The body is kept as raw bytes; the signature covers the exact bytes
 * sent, so JSON decoding happens only after it has been checked.
 */
async function webhookRoutes(fastify: FastifyInstance, opts: WebhookRouteOptions): Promise<void> {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post(
    opts.path,
    { bodyLimit: MAX_BODY_BYTES },
    async (request: FastifyRequest<{ Body: Buffer | string | undefined }>, reply: FastifyReply) => {
      const body = toBuffer(request.body);
      const delivery = headerValue(request.headers, DELIVERY_HEADER);

      if (opts.secret) {
        const signature = headerValue(request.headers, SIGNATURE_HEADER);
        if (!verifySignature(body, signature, opts.secret)) {
          fastify.log.warn({ delivery, ip: request.ip }, 'Rejected webhook with invalid signature');
          return reply.status(401).send({ error: 'invalid signature' });
        }
      }

      let event: WebhookEvent;
      try {
        event = parseEvent({ headers: request.headers, body });
      } catch (err: unknown) {
        if (err instanceof ParseError) {
          fastify.log.warn({ delivery, reason: err.message }, 'Rejected malformed webhook');
          return reply.status(400).send({ error: err.message });
        }
        throw err;
      }

      if (!fastify.eventQueue.tryEnqueue(event)) {
        fastify.log.warn({ event_id: event.id, type: event.type }, 'Event queue is full, rejecting event');
        return reply.status(503).send({ error: 'event queue is full' });
      }

      fastify.log.info(
        { event_id: event.id, type: event.type, action: event.action },
        'Webhook accepted',
      );

      return reply.status(200).send({ status: 'accepted', event_id: event.id });
    },
  );
}

function toBuffer(body: Buffer | string | undefined): Buffer {
  if (body === undefined) return Buffer.alloc(0);
  return typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
