export { signPayload, verifySignature } from './signature.js';
export { parseDuration } from './duration.js';
export {
  DELIVERY_HEADER,
  EVENT_HEADER,
  SIGNATURE_HEADER,
  headerValue,
  parseEvent,
} from './event-parser.js';
export type { RawDelivery, RawHeaders } from './event-parser.js';
export { evaluateCondition, qualifiedEventType } from './condition-evaluator.js';
export { MetricsAggregator, averageProcessingMs } from './metrics.js';
export type { MetricsSnapshot } from './metrics.js';
export { RuleStore } from './rule-store.js';
export { ActionDispatcher } from './action-dispatcher.js';
export { RuleEngine } from './rule-engine.js';
export {
  ACTION_TYPES,
  SUPPORTED_CONFIG_VERSION,
  mergeConfigs,
  parseConfig,
  toRules,
  validateConfig,
} from './rule-schema.js';
export type { Config } from './rule-schema.js';
