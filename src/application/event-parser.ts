import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import {
  ParseError,
  type WebhookEvent,
  type EventPayload,
  type KnownEventType,
  type GenericPayload,
  type RepositoryInfo,
  type RepositoryPayload,
  type SenderInfo,
  type UserPayload,
} from '../domain/index.js';
import {
  knownPayloadSchemas,
  isKnownEventType,
  repositoryPayloadSchema,
  userPayloadSchema,
} from './event-schema.js';

export const EVENT_HEADER = 'x-github-event';
export const DELIVERY_HEADER = 'x-github-delivery';
export const SIGNATURE_HEADER = 'x-hub-signature-256';

const PLATFORM_HEADER_PREFIX = 'x-github-';

export type RawHeaders = Readonly<Record<string, string | string[] | undefined>>;

export interface RawDelivery {
  readonly headers: RawHeaders;
  readonly body: Buffer;
  readonly receivedAt?: Date;
}

/** Reads a header by its lower-case name; repeated headers yield the first value. */
export function headerValue(headers: RawHeaders, name: string): string | undefined {
  const value = headers[name];
  if (Array.isArray(value)) return value[0];
  return value;
}

/**
 * Turns a raw delivery into a normalized event.
 *
 * Throws `ParseError` when the event-type header is missing, when the
 * body is not a JSON object, or when a known event type's payload has
 * fields of the wrong type.
 */
export function parseEvent(delivery: RawDelivery): WebhookEvent {
  const type = headerValue(delivery.headers, EVENT_HEADER)?.trim();
  if (!type) {
    throw new ParseError('missing X-GitHub-Event header');
  }

  const body = parseJsonObject(delivery.body);

  const payload = isKnownEventType(type)
    ? parseKnownPayload(type, body)
    : { kind: 'generic' as const, data: body };

  const fields = payload.kind === 'generic'
    ? extractGenericFields(payload.data)
    : {
        action: payload.data.action ?? '',
        repository: payload.data.repository,
        sender: payload.data.sender,
      };

  return {
    id: headerValue(delivery.headers, DELIVERY_HEADER) || randomUUID(),
    type,
    action: fields.action,
    repository: fields.repository ? normalizeRepository(fields.repository) : undefined,
    sender: fields.sender ? normalizeSender(fields.sender) : undefined,
    payload,
    raw_payload: delivery.body,
    received_at: delivery.receivedAt ?? new Date(),
    headers: platformHeaders(delivery.headers),
  };
}

function parseJsonObject(body: Buffer): GenericPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf-8'));
  } catch {
    throw new ParseError('request body is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new ParseError('request body must be a JSON object');
  }
  return parsed;
}

function parseKnownPayload(type: KnownEventType, body: GenericPayload): EventPayload {
  switch (type) {
    case 'push':
      return { kind: 'push', data: validatePayload(knownPayloadSchemas.push, body, type) };
    case 'pull_request':
      return { kind: 'pull_request', data: validatePayload(knownPayloadSchemas.pull_request, body, type) };
    case 'issues':
      return { kind: 'issues', data: validatePayload(knownPayloadSchemas.issues, body, type) };
    case 'issue_comment':
      return { kind: 'issue_comment', data: validatePayload(knownPayloadSchemas.issue_comment, body, type) };
    case 'release':
      return { kind: 'release', data: validatePayload(knownPayloadSchemas.release, body, type) };
    case 'workflow_run':
      return { kind: 'workflow_run', data: validatePayload(knownPayloadSchemas.workflow_run, body, type) };
  }
}

function validatePayload<T>(schema: z.ZodType<T>, body: GenericPayload, type: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ParseError(`invalid ${type} payload${where}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return parsed.data;
}

/**
 * Unknown event types: pick up `action`, `repository` and `sender` when
 * they sit at the top level with a usable shape, ignore them otherwise.
 */
function extractGenericFields(body: GenericPayload): {
  action: string;
  repository: RepositoryPayload | undefined;
  sender: UserPayload | undefined;
} {
  const repository = repositoryPayloadSchema.safeParse(body['repository']);
  const sender = userPayloadSchema.safeParse(body['sender']);
  const action = body['action'];

  return {
    action: typeof action === 'string' ? action : '',
    repository: isRecord(body['repository']) && repository.success ? repository.data : undefined,
    sender: isRecord(body['sender']) && sender.success ? sender.data : undefined,
  };
}

export function normalizeRepository(repo: RepositoryPayload): RepositoryInfo {
  return {
    name: repo.name ?? '',
    full_name: repo.full_name ?? '',
    private: repo.private ?? false,
    language: repo.language ?? '',
    default_branch: repo.default_branch ?? '',
    owner: { login: repo.owner?.login ?? '' },
  };
}

export function normalizeSender(user: UserPayload): SenderInfo {
  return {
    login: user.login ?? '',
    type: user.type ?? '',
    site_admin: user.site_admin ?? false,
  };
}

function platformHeaders(headers: RawHeaders): Record<string, string> {
  const subset: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    if (!key.startsWith(PLATFORM_HEADER_PREFIX) || value === undefined) continue;
    subset[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return subset;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
