import type { Logger } from 'pino';
import {
  ActionTimeoutError,
  HandlerNotFoundError,
  type Action,
  type ActionHandler,
  type Rule,
  type WebhookEvent,
} from '../domain/index.js';
import type { MetricsAggregator } from './metrics.js';
import { parseDuration } from './duration.js';

/**
 * Runs the actions of matched rules.
 *
 * Synchronous actions run in list order inside the worker's scope; the
 * first failure stops the rule and is thrown to the caller. Async actions
 * are detached: they get a fresh scope bounded only by their own timeout,
 * and their failures are logged and counted, never thrown.
 */
export class ActionDispatcher {
  private readonly detached = new Set<Promise<void>>();

  constructor(
    private readonly handlers: ReadonlyMap<string, ActionHandler>,
    private readonly metrics: MetricsAggregator,
    private readonly log: Logger,
  ) {}

  async executeRuleActions(rule: Rule, event: WebhookEvent, signal: AbortSignal): Promise<void> {
    for (const action of rule.actions) {
      this.metrics.recordActionExecuted();

      if (action.async === true) {
        this.launchDetached(rule, action, event);
        continue;
      }

      try {
        await this.runAction(action, event, signal);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`failed to execute action ${action.type}: ${reason}`, { cause: err });
      }
    }
  }

  /** Resolves once every detached action started so far has settled. */
  async settled(): Promise<void> {
    await Promise.allSettled([...this.detached]);
  }

  /** Number of detached actions still running. */
  get pending(): number {
    return this.detached.size;
  }

  private launchDetached(rule: Rule, action: Action, event: WebhookEvent): void {
    const task = this.runAction(action, event, undefined)
      .catch((err: unknown) => {
        this.metrics.recordError();
        this.log.error(
          { err, rule_id: rule.id, action_type: action.type, event_id: event.id },
          'Failed to execute async action',
        );
      })
      .finally(() => {
        this.detached.delete(task);
      });

    this.detached.add(task);
  }

  /**
   * Looks up the handler and executes it under a scope derived from
   * `parent` (or a fresh one) and bounded by the action's timeout.
   *
   * The timeout fails the action even when the handler ignores its
   * signal.
   */
  private async runAction(
    action: Action,
    event: WebhookEvent,
    parent: AbortSignal | undefined,
  ): Promise<void> {
    const handler = this.handlers.get(action.type);
    if (handler === undefined) {
      throw new HandlerNotFoundError(action.type);
    }

    const timeoutMs = this.resolveTimeout(action);
    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort(parent?.reason);

    if (parent?.aborted) {
      controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    this.log.info({ type: action.type, event_id: event.id }, 'Executing action');

    let timer: NodeJS.Timeout | undefined;

    try {
      // A handler that throws synchronously becomes a rejected execution.
      const execution = Promise.resolve().then(() =>
        handler.execute(event, action, controller.signal),
      );
      // Rejections before the deadline reach the caller through the race;
      // this only observes handlers that settle after being aborted.
      void execution.catch((err: unknown) => {
        if (controller.signal.aborted) {
          this.log.debug({ err, type: action.type, event_id: event.id }, 'Action settled after abort');
        }
      });

      const deadline = new Promise<never>((_resolve, reject) => {
        if (timeoutMs === null) return;
        timer = setTimeout(() => {
          const err = new ActionTimeoutError(action.type, timeoutMs);
          controller.abort(err);
          reject(err);
        }, timeoutMs);
      });

      await Promise.race([execution, deadline]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private resolveTimeout(action: Action): number | null {
    if (action.timeout === undefined || action.timeout === '') return null;

    const ms = parseDuration(action.timeout);
    if (ms === null) {
      this.log.warn({ type: action.type, timeout: action.timeout }, 'Ignoring invalid action timeout');
    }
    return ms;
  }
}
