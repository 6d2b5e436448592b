export type {
  WebhookEvent,
  EventPayload,
  KnownEventType,
  GenericPayload,
  RepositoryInfo,
  SenderInfo,
  RepositoryPayload,
  UserPayload,
  IssueItem,
  PullRequestItem,
  PushPayload,
  PullRequestPayload,
  IssuesPayload,
  IssueCommentPayload,
  ReleasePayload,
  WorkflowRunPayload,
} from './event.js';
export { CONDITION_TYPES, CONDITION_OPERATORS } from './rule.js';
export type {
  Rule,
  Condition,
  Action,
  ActionParameters,
} from './rule.js';
export type { ActionHandler } from './action-handler.js';
export { ParseError, ConfigError, HandlerNotFoundError, ActionTimeoutError } from './errors.js';
