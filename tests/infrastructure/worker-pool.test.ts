import { describe, it, expect, vi } from 'vitest';
import { EventQueue } from '../../src/infrastructure/queue/event-queue.js';
import { WorkerPool } from '../../src/infrastructure/worker/worker-pool.js';
import { RuleEngine } from '../../src/application/rule-engine.js';
import type { Action, ActionHandler, WebhookEvent } from '../../src/domain/index.js';
import { fakeLogger, makeEvent, makeRule, tick } from '../helpers.js';

/** Handler that waits `ms` (or until aborted) and records what it saw. */
function sleepingHandler(ms: number) {
  const started: string[] = [];
  const finished: string[] = [];
  const aborted: string[] = [];
  let active = 0;
  let maxActive = 0;

  const handler: ActionHandler = {
    execute: vi.fn(async (event: WebhookEvent, _action: Action, signal: AbortSignal) => {
      started.push(event.id);
      active++;
      maxActive = Math.max(maxActive, active);
      try {
        await new Promise<void>((resolve, reject) => {
          const timer = setTimeout(resolve, ms);
          signal.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(new Error('aborted'));
          }, { once: true });
        });
        finished.push(event.id);
      } catch (err: unknown) {
        aborted.push(event.id);
        throw err;
      } finally {
        active--;
      }
    }),
    validateParameters: vi.fn(),
  };

  return { handler, started, finished, aborted, maxActive: () => maxActive };
}

function setup(workers: number, capacity: number, handlerMs: number) {
  const log = fakeLogger();
  const engine = new RuleEngine(log);
  const sleeping = sleepingHandler(handlerMs);
  engine.registerHandler('sleep', sleeping.handler);
  engine.addRule(makeRule({ actions: [{ type: 'sleep', parameters: {} }] }));

  const queue = new EventQueue<WebhookEvent>(capacity);
  const pool = new WorkerPool(queue, engine, log, { workers });
  return { log, engine, queue, pool, sleeping };
}

describe('WorkerPool', () => {
  it('rejects a non-positive worker count', () => {
    const { engine, queue } = setup(1, 1, 0);
    expect(() => new WorkerPool(queue, engine, fakeLogger(), { workers: 0 })).toThrow(RangeError);
  });

  it('processes queued events through the engine', async () => {
    const { engine, queue, pool, sleeping } = setup(2, 10, 1);
    const running = new AbortController();
    pool.start(running.signal);

    queue.tryEnqueue(makeEvent({ id: 'e1' }));
    queue.tryEnqueue(makeEvent({ id: 'e2' }));
    await vi.waitFor(() => expect(sleeping.finished).toHaveLength(2));

    expect(engine.getMetrics().events_processed).toBe(2);

    running.abort();
    await pool.stop(1000);
  });

  it('never runs more handlers at once than there are workers', async () => {
    const { queue, pool, sleeping } = setup(2, 10, 10);
    const running = new AbortController();
    pool.start(running.signal);

    for (let i = 0; i < 6; i++) queue.tryEnqueue(makeEvent({ id: `e${i}` }));
    await vi.waitFor(() => expect(sleeping.finished).toHaveLength(6), { timeout: 2000 });

    expect(sleeping.maxActive()).toBe(2);

    running.abort();
    await pool.stop(1000);
  });

  it('refuses to start twice', () => {
    const { pool } = setup(1, 1, 0);
    const running = new AbortController();
    pool.start(running.signal);
    expect(() => pool.start(running.signal)).toThrow('worker pool already started');
    running.abort();
  });

  it('rejects the overflow event while one is in flight and one is buffered', async () => {
    const { queue, pool, sleeping } = setup(1, 1, 100);
    const running = new AbortController();
    pool.start(running.signal);

    expect(queue.tryEnqueue(makeEvent({ id: 'first' }))).toBe(true);
    await vi.waitFor(() => expect(sleeping.started).toEqual(['first']));

    expect(queue.tryEnqueue(makeEvent({ id: 'second' }))).toBe(true);
    expect(queue.tryEnqueue(makeEvent({ id: 'third' }))).toBe(false);

    await vi.waitFor(() => expect(sleeping.finished).toEqual(['first', 'second']), { timeout: 2000 });
    expect(sleeping.started).toEqual(['first', 'second']);

    running.abort();
    await pool.stop(1000);
  });

  it('lets in-flight events finish within the grace period', async () => {
    const { log, queue, pool, sleeping } = setup(1, 5, 30);
    const running = new AbortController();
    pool.start(running.signal);

    queue.tryEnqueue(makeEvent({ id: 'busy' }));
    await vi.waitFor(() => expect(sleeping.started).toEqual(['busy']));

    running.abort();
    await pool.stop(1000);

    expect(sleeping.finished).toEqual(['busy']);
    expect(sleeping.aborted).toEqual([]);
    expect(log.info).toHaveBeenCalledWith('Worker pool stopped');
  });

  it('aborts in-flight work after the grace period and drops the backlog', async () => {
    const { log, engine, queue, pool, sleeping } = setup(1, 5, 10_000);
    const running = new AbortController();
    pool.start(running.signal);

    queue.tryEnqueue(makeEvent({ id: 'stuck' }));
    await vi.waitFor(() => expect(sleeping.started).toEqual(['stuck']));
    queue.tryEnqueue(makeEvent({ id: 'waiting-1' }));
    queue.tryEnqueue(makeEvent({ id: 'waiting-2' }));

    running.abort();
    await pool.stop(20);

    expect(sleeping.aborted).toEqual(['stuck']);
    expect(sleeping.started).toEqual(['stuck']);
    expect(queue.size).toBe(0);
    expect(engine.getMetrics().errors).toBe(1);
    expect(log.warn).toHaveBeenCalledWith({ graceMs: 20 }, 'In-flight events did not finish in time, aborting them');
    expect(log.warn).toHaveBeenCalledWith({ dropped: 2 }, 'Dropped queued events at shutdown');
  });

  it('stops idle workers promptly', async () => {
    const { pool } = setup(3, 5, 0);
    const running = new AbortController();
    pool.start(running.signal);
    await tick();

    running.abort();
    await pool.stop(1000);
  });
});
