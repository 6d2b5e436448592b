import { z } from 'zod';
import type {
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
  KnownEventType,
} from '../domain/index.js';

/**
 * Zod schemas for the payload shapes of known GitHub event types.
 *
 * Every field is optional: GitHub omits fields freely across event
 * variants, and a delivery should only be rejected when a field is
 * present with the wrong type. Unknown top-level keys pass through.
 */

export const repositoryPayloadSchema: z.ZodType<RepositoryPayload> = z.object({
  name: z.string().optional(),
  full_name: z.string().optional(),
  private: z.boolean().optional(),
  language: z.string().nullable().optional(),
  default_branch: z.string().optional(),
  owner: z.object({ login: z.string().optional() }).optional(),
});

export const userPayloadSchema: z.ZodType<UserPayload> = z.object({
  login: z.string().optional(),
  type: z.string().optional(),
  site_admin: z.boolean().optional(),
});

const issueItemSchema: z.ZodType<IssueItem> = z.object({
  number: z.number().int().optional(),
  title: z.string().optional(),
  state: z.string().optional(),
  pull_request: z.record(z.string(), z.unknown()).optional(),
});

const pullRequestItemSchema: z.ZodType<PullRequestItem> = z.object({
  number: z.number().int().optional(),
  title: z.string().optional(),
  state: z.string().optional(),
  merged: z.boolean().optional(),
  head: z.object({ ref: z.string().optional(), sha: z.string().optional() }).optional(),
  base: z.object({ ref: z.string().optional() }).optional(),
});

const basePayloadSchema = z.object({
  action: z.string().optional(),
  repository: repositoryPayloadSchema.optional(),
  sender: userPayloadSchema.optional(),
});

const pushPayloadSchema: z.ZodType<PushPayload> = basePayloadSchema.extend({
  ref: z.string().optional(),
  before: z.string().optional(),
  after: z.string().optional(),
  commits: z.array(z.object({
    id: z.string().optional(),
    message: z.string().optional(),
  })).optional(),
}).passthrough();

const pullRequestPayloadSchema: z.ZodType<PullRequestPayload> = basePayloadSchema.extend({
  number: z.number().int().optional(),
  pull_request: pullRequestItemSchema.optional(),
}).passthrough();

const issuesPayloadSchema: z.ZodType<IssuesPayload> = basePayloadSchema.extend({
  issue: issueItemSchema.optional(),
}).passthrough();

const issueCommentPayloadSchema: z.ZodType<IssueCommentPayload> = basePayloadSchema.extend({
  issue: issueItemSchema.optional(),
  comment: z.object({
    id: z.number().int().optional(),
    body: z.string().optional(),
  }).optional(),
}).passthrough();

const releasePayloadSchema: z.ZodType<ReleasePayload> = basePayloadSchema.extend({
  release: z.object({
    tag_name: z.string().optional(),
    name: z.string().nullable().optional(),
    draft: z.boolean().optional(),
    prerelease: z.boolean().optional(),
  }).optional(),
}).passthrough();

const workflowRunPayloadSchema: z.ZodType<WorkflowRunPayload> = basePayloadSchema.extend({
  workflow_run: z.object({
    id: z.number().int().optional(),
    name: z.string().optional(),
    conclusion: z.string().nullable().optional(),
    head_branch: z.string().optional(),
    head_sha: z.string().optional(),
    html_url: z.string().optional(),
  }).optional(),
}).passthrough();

/** Schemas keyed by the `X-GitHub-Event` value they apply to. */
export const knownPayloadSchemas = {
  push: pushPayloadSchema,
  pull_request: pullRequestPayloadSchema,
  issues: issuesPayloadSchema,
  issue_comment: issueCommentPayloadSchema,
  release: releasePayloadSchema,
  workflow_run: workflowRunPayloadSchema,
} satisfies Record<KnownEventType, z.ZodTypeAny>;

export function isKnownEventType(type: string): type is KnownEventType {
  return Object.prototype.hasOwnProperty.call(knownPayloadSchemas, type);
}
