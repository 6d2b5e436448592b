/**
 * Core domain types for a normalized webhook delivery.
 *
 * These types define the shape of an event as it flows from the HTTP
 * surface through the queue and into the rule engine. They carry no
 * framework dependencies.
 */

/** Normalized subset of the repository a delivery refers to. */
export interface RepositoryInfo {
  readonly name: string;
  readonly full_name: string;
  readonly private: boolean;
  readonly language: string;
  readonly default_branch: string;
  readonly owner: { readonly login: string };
}

/** Normalized subset of the account that triggered a delivery. */
export interface SenderInfo {
  readonly login: string;
  readonly type: string;
  readonly site_admin: boolean;
}

// --------------------------------------------------
// Payload shapes for known event types
// --------------------------------------------------

export interface RepositoryPayload {
  name?: string;
  full_name?: string;
  private?: boolean;
  language?: string | null;
  default_branch?: string;
  owner?: { login?: string };
}

export interface UserPayload {
  login?: string;
  type?: string;
  site_admin?: boolean;
}

interface BasePayload {
  action?: string;
  repository?: RepositoryPayload;
  sender?: UserPayload;
}

export interface IssueItem {
  number?: number;
  title?: string;
  state?: string;
  /** Present when the issue is a pull request. */
  pull_request?: Record<string, unknown>;
}

export interface PullRequestItem {
  number?: number;
  title?: string;
  state?: string;
  merged?: boolean;
  head?: { ref?: string; sha?: string };
  base?: { ref?: string };
}

export interface PushPayload extends BasePayload {
  ref?: string;
  before?: string;
  after?: string;
  commits?: Array<{ id?: string; message?: string }>;
}

export interface PullRequestPayload extends BasePayload {
  number?: number;
  pull_request?: PullRequestItem;
}

export interface IssuesPayload extends BasePayload {
  issue?: IssueItem;
}

export interface IssueCommentPayload extends BasePayload {
  issue?: IssueItem;
  comment?: { id?: number; body?: string };
}

export interface ReleasePayload extends BasePayload {
  release?: {
    tag_name?: string;
    name?: string | null;
    draft?: boolean;
    prerelease?: boolean;
  };
}

export interface WorkflowRunPayload extends BasePayload {
  workflow_run?: {
    id?: number;
    name?: string;
    conclusion?: string | null;
    head_branch?: string;
    head_sha?: string;
    html_url?: string;
  };
}

/** Free-form payload kept for event types without a dedicated shape. */
export type GenericPayload = Record<string, unknown>;

/**
 * Payload of a delivery, tagged by how it was parsed.
 *
 * Known event types carry their typed shape; everything else is kept as
 * a generic object.
 */
export type EventPayload =
  | { readonly kind: 'push'; readonly data: PushPayload }
  | { readonly kind: 'pull_request'; readonly data: PullRequestPayload }
  | { readonly kind: 'issues'; readonly data: IssuesPayload }
  | { readonly kind: 'issue_comment'; readonly data: IssueCommentPayload }
  | { readonly kind: 'release'; readonly data: ReleasePayload }
  | { readonly kind: 'workflow_run'; readonly data: WorkflowRunPayload }
  | { readonly kind: 'generic'; readonly data: GenericPayload };

export type KnownEventType = Exclude<EventPayload['kind'], 'generic'>;

/**
 * Canonical webhook event.
 *
 * `id` is the platform's delivery id, or a generated UUID when the
 * delivery carried none. It labels the event in logs only.
 */
export interface WebhookEvent {
  readonly id: string;
  readonly type: string;
  /** Sub-action for compound event types, `''` when not applicable. */
  readonly action: string;
  readonly repository: RepositoryInfo | undefined;
  readonly sender: SenderInfo | undefined;
  readonly payload: EventPayload;
  readonly raw_payload: Buffer;
  readonly received_at: Date;
  readonly headers: Readonly<Record<string, string>>;
}
