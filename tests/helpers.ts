import { vi } from 'vitest';
import type { Action, ActionHandler, Rule, WebhookEvent } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

let counter = 0;

/**
 * Factory for test events with sensible defaults: an opened pull
 * request on octo-org/widgets, sent by alice.
 */
export function makeEvent(overrides: Partial<WebhookEvent> = {}): WebhookEvent {
  counter++;
  return {
    id: `delivery-${counter}`,
    type: 'pull_request',
    action: 'opened',
    repository: {
      name: 'widgets',
      full_name: 'octo-org/widgets',
      private: false,
      language: 'TypeScript',
      default_branch: 'main',
      owner: { login: 'octo-org' },
    },
    sender: { login: 'alice', type: 'User', site_admin: false },
    payload: { kind: 'pull_request', data: { action: 'opened', number: 42 } },
    raw_payload: Buffer.from('{}'),
    received_at: new Date('2026-01-15T10:00:00Z'),
    headers: {},
    ...overrides,
  };
}

/** Rule factory; defaults to an enabled rule matching `pull_request.opened`. */
export function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: 'rule-1',
    name: 'Test rule',
    enabled: true,
    conditions: [{ type: 'event_type', operator: 'equals', value: 'pull_request.opened' }],
    actions: [{ type: 'record', parameters: {} }],
    ...overrides,
  };
}

/** Handler that records every call and resolves immediately. */
export function recordingHandler() {
  const calls: Array<{ event: WebhookEvent; action: Action; signal: AbortSignal }> = [];
  const handler: ActionHandler = {
    execute: vi.fn(async (event: WebhookEvent, action: Action, signal: AbortSignal) => {
      calls.push({ event, action, signal });
    }),
    validateParameters: vi.fn(),
  };
  return { handler, calls };
}

/** Waits for pending timers and microtasks to run. */
export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The `err` field of the n-th `log.error` call. */
export function loggedError(log: import('pino').Logger, index = 0): Error {
  const call: unknown[] = vi.mocked(log.error).mock.calls[index] ?? [];
  const fields = call[0];
  if (typeof fields === 'object' && fields !== null && 'err' in fields && fields.err instanceof Error) {
    return fields.err;
  }
  throw new Error(`log.error call ${index} carried no error`);
}
