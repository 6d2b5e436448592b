export { WorkerPool } from './worker-pool.js';
export type { WorkerPoolOptions } from './worker-pool.js';
export {
  startRuleSubscriber,
  createRuleReloader,
  reloadRules,
  RULES_CHANGED_CHANNEL,
} from './rule-subscriber.js';
export type { ReloadFn, RuleLoader, RuleTarget } from './rule-subscriber.js';
