import { describe, it, expect } from 'vitest';
import { MetricsAggregator, averageProcessingMs } from '../../src/application/metrics.js';

describe('MetricsAggregator', () => {
  it('starts at zero', () => {
    expect(new MetricsAggregator().snapshot()).toEqual({
      events_processed: 0,
      rules_evaluated: 0,
      actions_executed: 0,
      errors: 0,
      processing_ms: 0,
    });
  });

  it('accumulates counters', () => {
    const m = new MetricsAggregator();
    m.recordEvent(4);
    m.recordEvent(6);
    m.recordRuleEvaluated();
    m.recordActionExecuted();
    m.recordActionExecuted();
    m.recordError();

    expect(m.snapshot()).toEqual({
      events_processed: 2,
      rules_evaluated: 1,
      actions_executed: 2,
      errors: 1,
      processing_ms: 10,
    });
  });

  it('returns a copy that later updates do not change', () => {
    const m = new MetricsAggregator();
    const before = m.snapshot();
    m.recordError();
    expect(before.errors).toBe(0);
    expect(m.snapshot().errors).toBe(1);
  });
});

describe('averageProcessingMs', () => {
  it('is 0 before any event', () => {
    expect(averageProcessingMs(new MetricsAggregator().snapshot())).toBe(0);
  });

  it('divides total time by event count, rounded to 3 decimals', () => {
    const m = new MetricsAggregator();
    m.recordEvent(1);
    m.recordEvent(1);
    m.recordEvent(2);
    expect(averageProcessingMs(m.snapshot())).toBe(1.333);
  });
});
