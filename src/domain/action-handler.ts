import type { WebhookEvent } from './event.js';
import type { Action, ActionParameters } from './rule.js';

/**
 * Capability that performs one kind of action.
 *
 * Handlers are registered with the engine by action type. `execute`
 * should honour `signal`: it is aborted when the action times out or the
 * engine shuts down.
 */
export interface ActionHandler {
  execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void>;
  /** Throws when the parameters cannot be used by this handler. */
  validateParameters(parameters: ActionParameters): void;
}
