export {
  loadConfig,
  loadConfigFromDirectory,
  loadRules,
  resolveNotificationUrls,
} from './rule-loader.js';
export type { LoadedRules, RuleSources } from './rule-loader.js';
export { loadServerConfig } from './server-config.js';
export type { ServerConfig } from './server-config.js';
