import type { Rule } from '../domain/index.js';

/**
 * Holds the active rule list as an immutable snapshot.
 *
 * Readers call `get()` once per event and evaluate against that array
 * for the whole event, so a concurrent `set()` or `add()` never changes
 * the rules mid-evaluation. Writers build a new frozen array and swap
 * the reference; the previous snapshot stays intact for anyone holding
 * it.
 */
export class RuleStore {
  private rules: readonly Rule[];

  constructor(initial: readonly Rule[] = []) {
    this.rules = Object.freeze([...initial]);
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly Rule[] {
    return this.rules;
  }

  /** Atomically replaces the snapshot. */
  set(next: readonly Rule[]): void {
    this.rules = Object.freeze([...next]);
  }

  /** Appends one rule, keeping registration order. */
  add(rule: Rule): void {
    this.rules = Object.freeze([...this.rules, rule]);
  }
}
