/** Condition categories understood by the rule engine. */
export const CONDITION_TYPES = ['event_type', 'repository', 'sender', 'payload', 'time'] as const;

/** Comparison operators a condition may use. */
export const CONDITION_OPERATORS = [
  'equals',
  'not_equals',
  'contains',
  'starts_with',
  'ends_with',
  'matches',
  'in',
] as const;

/**
 * One predicate within a rule.
 *
 * `value` stays untyped: depending on the field it holds a string, a
 * boolean, a list, or a regular expression source. The evaluator narrows
 * it and treats a mismatched comparand as "no match".
 */
export interface Condition {
  readonly type: string;
  readonly field?: string;
  readonly operator: string;
  readonly value?: unknown;
  readonly parameters?: Readonly<Record<string, unknown>>;
}

export type ActionParameters = Readonly<Record<string, unknown>>;

/** One effect to trigger when a rule matches. */
export interface Action {
  readonly type: string;
  readonly parameters: ActionParameters;
  /** Detach execution from the worker that processes the event. */
  readonly async?: boolean;
  /** Duration string such as `30s` or `1m30s`. */
  readonly timeout?: string;
}

/**
 * A named AND-predicate over an event plus the actions it triggers.
 *
 * `priority` is stored for operators but does not affect evaluation
 * order: rules run in the order they were registered.
 */
export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly enabled: boolean;
  readonly priority?: number;
  readonly conditions: readonly Condition[];
  readonly actions: readonly Action[];
  readonly metadata?: Readonly<Record<string, unknown>>;
}
