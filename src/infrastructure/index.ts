export { EventQueue } from './queue/event-queue.js';
export { WorkerPool, startRuleSubscriber, createRuleReloader, reloadRules } from './worker/index.js';
export type { WorkerPoolOptions, ReloadFn, RuleLoader, RuleTarget } from './worker/index.js';
export { registerDefaultHandlers } from './handlers/index.js';
export type { DefaultHandlerDeps } from './handlers/index.js';
export {
  loadConfig,
  loadConfigFromDirectory,
  loadRules,
  loadServerConfig,
  resolveNotificationUrls,
} from './config/index.js';
export type { LoadedRules, RuleSources, ServerConfig } from './config/index.js';
export { createLogger } from './logger.js';
