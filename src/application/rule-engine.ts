import type { Logger } from 'pino';
import {
  ConfigError,
  type ActionHandler,
  type Rule,
  type WebhookEvent,
} from '../domain/index.js';
import { evaluateCondition } from './condition-evaluator.js';
import { ActionDispatcher } from './action-dispatcher.js';
import { MetricsAggregator, type MetricsSnapshot } from './metrics.js';
import { RuleStore } from './rule-store.js';

/**
 * Rule engine: holds the active rules and the handler registry, matches
 * events against rules and hands matched rules to the dispatcher.
 *
 * Rules are evaluated in registration order. `priority` is kept on the
 * rule for operators but is not used as a sort key.
 */
export class RuleEngine {
  readonly metrics: MetricsAggregator;

  private readonly handlers = new Map<string, ActionHandler>();
  private readonly store = new RuleStore();
  private readonly dispatcher: ActionDispatcher;

  constructor(private readonly log: Logger, metrics: MetricsAggregator = new MetricsAggregator()) {
    this.metrics = metrics;
    this.dispatcher = new ActionDispatcher(this.handlers, this.metrics, log);
  }

  /** Registers the handler for one action type. Each type can be registered once. */
  registerHandler(actionType: string, handler: ActionHandler): void {
    if (this.handlers.has(actionType)) {
      throw new Error(`handler for action type ${actionType} already registered`);
    }

    this.handlers.set(actionType, handler);
    this.log.info({ type: actionType }, 'Registered action handler');
  }

  /** Validates and appends one rule to the active set. */
  addRule(rule: Rule): void {
    this.validateRule(rule);
    if (this.store.get().some((existing) => existing.id === rule.id)) {
      throw new ConfigError(`invalid rule: duplicate rule ID: ${rule.id}`);
    }

    this.store.add(rule);
    this.log.info({ id: rule.id, name: rule.name, priority: rule.priority ?? 0 }, 'Added rule');
  }

  /**
   * Replaces the whole rule set. Every rule is validated first; on any
   * failure the current set stays active.
   */
  replaceRules(rules: readonly Rule[]): void {
    const seen = new Set<string>();
    for (const rule of rules) {
      this.validateRule(rule);
      if (seen.has(rule.id)) {
        throw new ConfigError(`invalid rule: duplicate rule ID: ${rule.id}`);
      }
      seen.add(rule.id);
    }

    this.store.set(rules);
    this.log.info({ ruleCount: rules.length, ruleIds: rules.map((r) => r.id) }, 'Rules replaced');
  }

  /** Current rule snapshot, in registration order. */
  rules(): readonly Rule[] {
    return this.store.get();
  }

  /** True iff every condition of `rule` holds for `event`. */
  evaluateRule(rule: Rule, event: WebhookEvent): boolean {
    return rule.conditions.every((condition) => evaluateCondition(condition, event, this.log));
  }

  /**
   * Evaluates every enabled rule against the event, then runs the actions
   * of each matching rule.
   *
   * A failing rule is logged and counted; the remaining matched rules
   * still run. Never throws for rule or action failures.
   */
  async processEvent(event: WebhookEvent, signal: AbortSignal): Promise<void> {
    const start = performance.now();

    try {
      this.log.info(
        { event_id: event.id, type: event.type, action: event.action },
        'Processing event',
      );

      const rules = this.store.get();
      const matched: Rule[] = [];

      for (const rule of rules) {
        if (!rule.enabled) continue;

        this.metrics.recordRuleEvaluated();

        if (this.evaluateRule(rule, event)) {
          matched.push(rule);
          this.log.debug({ rule_id: rule.id, rule_name: rule.name }, 'Rule matched');
        }
      }

      for (const rule of matched) {
        try {
          await this.dispatcher.executeRuleActions(rule, event, signal);
        } catch (err: unknown) {
          this.metrics.recordError();
          this.log.error(
            { err, rule_id: rule.id, event_id: event.id },
            'Failed to execute rule actions',
          );
        }
      }
    } finally {
      this.metrics.recordEvent(performance.now() - start);
    }
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  /** Resolves once all detached (async) actions started so far have settled. */
  async settled(): Promise<void> {
    await this.dispatcher.settled();
  }

  /** Number of detached actions still running. */
  get pendingActions(): number {
    return this.dispatcher.pending;
  }

  private validateRule(rule: Rule): void {
    const problem = this.findRuleProblem(rule);
    if (problem !== null) {
      throw new ConfigError(`invalid rule: ${problem}`);
    }
  }

  private findRuleProblem(rule: Rule): string | null {
    if (!rule.id) return 'rule ID is required';
    if (!rule.name) return 'rule name is required';
    if (rule.conditions.length === 0) return 'at least one condition is required';
    if (rule.actions.length === 0) return 'at least one action is required';

    for (const [i, condition] of rule.conditions.entries()) {
      if (!condition.type) return `condition[${i}] type is required`;
      if (!condition.operator) return `condition[${i}] operator is required`;
    }

    for (const [i, action] of rule.actions.entries()) {
      if (!action.type) return `action[${i}] type is required`;

      const handler = this.handlers.get(action.type);
      if (handler === undefined) continue;

      try {
        handler.validateParameters(action.parameters);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        return `action[${i}] parameter validation failed: ${reason}`;
      }
    }

    return null;
  }
}
