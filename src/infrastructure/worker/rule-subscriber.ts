import Redis from 'ioredis';
import type { Logger } from 'pino';
import type { Rule } from '../../domain/index.js';

export const RULES_CHANGED_CHANNEL = 'rules_changed';

/** Anything that can swap in a new rule set; the engine in production. */
export interface RuleTarget {
  replaceRules(rules: readonly Rule[]): void;
}

export type RuleLoader = () => Promise<{ rules: Rule[] }>;

/** Triggers a reload; `trigger` names what asked for it, for the logs. */
export type ReloadFn = (trigger: string) => Promise<void>;

/**
 * Subscribes to the "rules_changed" Pub/Sub channel and reloads the rule
 * files whenever a notification arrives.
 *
 * ioredis requires a dedicated connection for subscriptions: once a client
 * enters subscriber mode it cannot issue regular commands.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startRuleSubscriber(
  redisUrl: string,
  log: Logger,
  reload: ReloadFn,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Rule subscriber Redis connection established');

  sub.on('message', (channel: string, message: string) => {
    if (channel !== RULES_CHANGED_CHANNEL) return;
    if (signal.aborted) return;

    log.debug({ message }, 'Rule change notification received');
    void reload('redis');
  });

  await sub.subscribe(RULES_CHANGED_CHANNEL);
  log.info({ channel: RULES_CHANGED_CHANNEL }, 'Subscribed to rule change notifications');

  return async () => {
    try {
      await sub.unsubscribe(RULES_CHANGED_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Rule subscriber did not disconnect cleanly');
      sub.disconnect();
    }
    log.info('Rule subscriber disconnected');
  };
}

/**
 * Builds a reload function bound to one loader and target. Requests that
 * arrive while a reload is running are skipped.
 */
export function createRuleReloader(load: RuleLoader, target: RuleTarget, log: Logger): ReloadFn {
  let reloading = false;
  return (trigger) =>
    reloadRules(load, target, log, trigger, () => reloading, (v) => { reloading = v; });
}

/**
 * Loads the rule files and swaps the target's rule set. On any failure
 * the previous set stays active. Never throws.
 */
export async function reloadRules(
  load: RuleLoader,
  target: RuleTarget,
  log: Logger,
  trigger: string,
  getReloading: () => boolean,
  setReloading: (v: boolean) => void,
): Promise<void> {
  if (getReloading()) {
    log.debug({ trigger }, 'Reload already in progress, skipping');
    return;
  }

  setReloading(true);
  try {
    log.info({ trigger }, 'Reloading rules');

    const { rules } = await load();
    target.replaceRules(rules);

    log.info(
      { ruleCount: rules.length, ruleIds: rules.map((r) => r.id) },
      'Rules reloaded successfully',
    );
  } catch (err: unknown) {
    log.error({ err, trigger }, 'Failed to reload rules, keeping current rule set');
  } finally {
    setReloading(false);
  }
}
