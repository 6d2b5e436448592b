import type { Logger } from 'pino';
import type { Condition, WebhookEvent } from '../domain/index.js';

/**
 * The string every `event_type` condition is compared against:
 * `type`, or `type.action` for compound events such as
 * `pull_request.opened`.
 */
export function qualifiedEventType(event: WebhookEvent): string {
  return event.action !== '' ? `${event.type}.${event.action}` : event.type;
}

/**
 * Evaluates one condition against an event.
 *
 * Pure apart from a warning for unknown condition types. A comparand of
 * the wrong type, an unknown field, or an invalid regular expression
 * evaluates to `false`; nothing here throws.
 */
export function evaluateCondition(
  condition: Condition,
  event: WebhookEvent,
  log?: Logger,
): boolean {
  switch (condition.type) {
    case 'event_type':
      return evaluateEventTypeCondition(condition, event);
    case 'repository':
      return evaluateRepositoryCondition(condition, event);
    case 'sender':
      return evaluateSenderCondition(condition, event);
    case 'payload':
      // Extension point: no field-path mechanism for payload inspection yet.
      return false;
    case 'time':
      // Extension point: no time-window predicates yet, so no restriction.
      return true;
    default:
      log?.warn({ type: condition.type }, 'Unknown condition type');
      return false;
  }
}

function evaluateEventTypeCondition(condition: Condition, event: WebhookEvent): boolean {
  const eventType = qualifiedEventType(event);

  switch (condition.operator) {
    case 'equals':
      return typeof condition.value === 'string' && eventType === condition.value;
    case 'not_equals':
      return typeof condition.value === 'string' && eventType !== condition.value;
    case 'in':
      return inList(eventType, condition.value);
    case 'matches':
      return regexSearch(eventType, condition.value);
    default:
      return false;
  }
}

function evaluateRepositoryCondition(condition: Condition, event: WebhookEvent): boolean {
  const repo = event.repository;
  if (repo === undefined) return false;

  switch (condition.field) {
    case 'name':
      return evaluateStringCondition(condition, repo.name);
    case 'full_name':
      return evaluateStringCondition(condition, repo.full_name);
    case 'private':
      return evaluateBoolCondition(condition, repo.private);
    case 'language':
      return evaluateStringCondition(condition, repo.language);
    case 'default_branch':
      return evaluateStringCondition(condition, repo.default_branch);
    default:
      return false;
  }
}

function evaluateSenderCondition(condition: Condition, event: WebhookEvent): boolean {
  const sender = event.sender;
  if (sender === undefined) return false;

  switch (condition.field) {
    case 'login':
      return evaluateStringCondition(condition, sender.login);
    case 'type':
      return evaluateStringCondition(condition, sender.type);
    case 'site_admin':
      return evaluateBoolCondition(condition, sender.site_admin);
    default:
      return false;
  }
}

/** Case-sensitive string comparison using the condition's operator. */
export function evaluateStringCondition(condition: Condition, value: string): boolean {
  const expected = condition.value;

  switch (condition.operator) {
    case 'equals':
      return typeof expected === 'string' && value === expected;
    case 'not_equals':
      return typeof expected === 'string' && value !== expected;
    case 'contains':
      return typeof expected === 'string' && value.includes(expected);
    case 'starts_with':
      return typeof expected === 'string' && value.startsWith(expected);
    case 'ends_with':
      return typeof expected === 'string' && value.endsWith(expected);
    case 'matches':
      return regexSearch(value, expected);
    case 'in':
      return inList(value, expected);
    default:
      return false;
  }
}

/** Boolean fields support only `equals` and `not_equals` against a boolean. */
export function evaluateBoolCondition(condition: Condition, value: boolean): boolean {
  const expected = condition.value;
  if (typeof expected !== 'boolean') return false;

  switch (condition.operator) {
    case 'equals':
      return value === expected;
    case 'not_equals':
      return value !== expected;
    default:
      return false;
  }
}

function inList(value: string, list: unknown): boolean {
  if (!Array.isArray(list)) return false;
  return list.some((entry) => typeof entry === 'string' && entry === value);
}

/** Unanchored search, so `po` matches `push`. */
function regexSearch(value: string, pattern: unknown): boolean {
  if (typeof pattern !== 'string') return false;
  try {
    return new RegExp(pattern).test(value);
  } catch {
    return false;
  }
}
