export { default as enginePlugin } from './engine-plugin.js';
export type { EnginePluginOptions } from './engine-plugin.js';
export { default as webhookRoutes } from './webhook-routes.js';
export type { WebhookRouteOptions } from './webhook-routes.js';
export { default as healthRoutes } from './health-routes.js';
