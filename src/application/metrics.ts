/** Point-in-time copy of the engine counters. */
export interface MetricsSnapshot {
  readonly events_processed: number;
  readonly rules_evaluated: number;
  readonly actions_executed: number;
  readonly errors: number;
  /** Cumulative processing time across all events, in milliseconds. */
  readonly processing_ms: number;
}

/**
 * Process-wide engine counters.
 *
 * Each update is a synchronous increment, so a reader on the event loop
 * always sees a consistent snapshot and never waits on a worker.
 */
export class MetricsAggregator {
  private eventsProcessed = 0;
  private rulesEvaluated = 0;
  private actionsExecuted = 0;
  private errors = 0;
  private processingMs = 0;

  recordEvent(durationMs: number): void {
    this.eventsProcessed++;
    this.processingMs += durationMs;
  }

  recordRuleEvaluated(): void {
    this.rulesEvaluated++;
  }

  recordActionExecuted(): void {
    this.actionsExecuted++;
  }

  recordError(): void {
    this.errors++;
  }

  snapshot(): MetricsSnapshot {
    return {
      events_processed: this.eventsProcessed,
      rules_evaluated: this.rulesEvaluated,
      actions_executed: this.actionsExecuted,
      errors: this.errors,
      processing_ms: this.processingMs,
    };
  }
}

/** Mean processing time per event, or 0 before the first event. */
export function averageProcessingMs(snapshot: MetricsSnapshot): number {
  if (snapshot.events_processed === 0) return 0;
  return parseFloat((snapshot.processing_ms / snapshot.events_processed).toFixed(3));
}
