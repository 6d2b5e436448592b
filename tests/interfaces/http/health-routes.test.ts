import { describe, it, expect, afterEach } from 'vitest';
import pino from 'pino';
import { buildServer } from '../../../src/server.js';
import { RuleEngine } from '../../../src/application/rule-engine.js';
import { MetricsAggregator } from '../../../src/application/metrics.js';
import { EventQueue } from '../../../src/infrastructure/queue/event-queue.js';
import type { WebhookEvent } from '../../../src/domain/index.js';
import { fakeLogger, makeEvent } from '../../helpers.js';

type App = Awaited<ReturnType<typeof buildServer>>;

describe('health routes', () => {
  let app: App | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function setup(metrics = new MetricsAggregator()) {
    const engine = new RuleEngine(fakeLogger(), metrics);
    const queue = new EventQueue<WebhookEvent>(5);
    app = await buildServer({ logger: pino({ level: 'silent' }), engine, queue, webhookPath: '/webhook' });
    return { app, queue };
  }

  it('GET /health reports healthy with a timestamp', async () => {
    const ctx = await setup();

    const res = await ctx.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    const body: unknown = res.json();
    expect(body).toEqual({ status: 'healthy', timestamp: expect.any(String) });
    const timestamp = typeof body === 'object' && body !== null && 'timestamp' in body ? String(body.timestamp) : '';
    expect(new Date(timestamp).toISOString()).toBe(timestamp);
  });

  it('GET /metrics reports zeros before any event', async () => {
    const ctx = await setup();

    const res = await ctx.app.inject({ method: 'GET', url: '/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      events_processed: 0,
      rules_evaluated: 0,
      actions_executed: 0,
      errors: 0,
      avg_processing_ms: 0,
      queue_size: 0,
    });
  });

  it('GET /metrics reports counters, average and queue depth', async () => {
    const metrics = new MetricsAggregator();
    metrics.recordEvent(10);
    metrics.recordEvent(20);
    metrics.recordRuleEvaluated();
    metrics.recordActionExecuted();
    metrics.recordError();
    const ctx = await setup(metrics);
    ctx.queue.tryEnqueue(makeEvent());

    const res = await ctx.app.inject({ method: 'GET', url: '/metrics' });

    expect(res.json()).toEqual({
      events_processed: 2,
      rules_evaluated: 1,
      actions_executed: 1,
      errors: 1,
      avg_processing_ms: 15,
      queue_size: 1,
    });
  });
});
