import type { Logger } from 'pino';
import type { WebhookEvent } from '../../domain/index.js';
import type { RuleEngine } from '../../application/rule-engine.js';
import type { EventQueue } from '../queue/event-queue.js';

export interface WorkerPoolOptions {
  /** Number of concurrent consumers. */
  readonly workers: number;
}

/**
 * Fixed set of consumers draining the event queue.
 *
 * Each worker takes one event at a time and runs it through the engine
 * before taking the next, which caps concurrent synchronous handler
 * calls at the worker count.
 *
 * Two signals are involved: the one passed to `start()` stops workers
 * from taking new events; the pool's own processing signal is handed to
 * the engine and is only aborted by `stop()` once the grace period for
 * in-flight events runs out.
 */
export class WorkerPool {
  private readonly processing = new AbortController();
  private loops: Promise<void>[] = [];

  constructor(
    private readonly queue: EventQueue<WebhookEvent>,
    private readonly engine: RuleEngine,
    private readonly log: Logger,
    private readonly options: WorkerPoolOptions,
  ) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new RangeError(`worker count must be a positive integer, got ${options.workers}`);
    }
  }

  /** Launches the workers. They run until `signal` aborts. */
  start(signal: AbortSignal): void {
    if (this.loops.length > 0) {
      throw new Error('worker pool already started');
    }

    this.loops = Array.from({ length: this.options.workers }, (_, i) =>
      this.runWorker(`worker-${i + 1}`, signal),
    );

    this.log.info({ workers: this.options.workers, capacity: this.queue.capacity }, 'Worker pool started');
  }

  /**
   * Waits up to `graceMs` for workers to finish their current event, then
   * aborts whatever is still running and drops queued events.
   *
   * Call after aborting the signal given to `start()`.
   */
  async stop(graceMs: number): Promise<void> {
    const all = Promise.all(this.loops).then(() => true);

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });

    const finished = await Promise.race([all, grace]);
    clearTimeout(timer);

    if (!finished) {
      this.log.warn({ graceMs }, 'In-flight events did not finish in time, aborting them');
      this.processing.abort();
      await all;
    }

    const dropped = this.queue.drain();
    if (dropped > 0) {
      this.log.warn({ dropped }, 'Dropped queued events at shutdown');
    }

    this.log.info('Worker pool stopped');
  }

  private async runWorker(id: string, signal: AbortSignal): Promise<void> {
    this.log.debug({ worker: id }, 'Worker started');

    while (!signal.aborted) {
      const event = await this.queue.dequeue(signal);
      if (event === null) break;

      try {
        await this.engine.processEvent(event, this.processing.signal);
      } catch (err: unknown) {
        this.log.error({ err, worker: id, event_id: event.id }, 'Worker failed to process event');
      }
    }

    this.log.debug({ worker: id }, 'Worker stopped');
  }
}
