/** The delivery could not be turned into an event. Surfaces as HTTP 400. */
export class ParseError extends Error {
  override readonly name = 'ParseError';
}

/** A rule or rule file failed validation. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/** No handler is registered for an action's type. */
export class HandlerNotFoundError extends Error {
  override readonly name = 'HandlerNotFoundError';

  constructor(readonly actionType: string) {
    super(`no handler registered for action type: ${actionType}`);
  }
}

/** An action did not finish within its configured timeout. */
export class ActionTimeoutError extends Error {
  override readonly name = 'ActionTimeoutError';

  constructor(readonly actionType: string, readonly timeoutMs: number) {
    super(`action ${actionType} timed out after ${timeoutMs}ms`);
  }
}
