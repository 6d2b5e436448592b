import type { RepositoryInfo, WebhookEvent } from '../../domain/index.js';

export interface RepoCoordinates {
  readonly owner: string;
  readonly repo: string;
  readonly repository: RepositoryInfo;
}

/** Owner and name of the event's repository; throws when the event has none. */
export function requireRepository(event: WebhookEvent): RepoCoordinates {
  const repository = event.repository;
  if (repository === undefined) {
    throw new Error('repository information not available');
  }
  return { owner: repository.owner.login, repo: repository.name, repository };
}

/** Issue or pull request number the event refers to, if any. */
export function issueOrPullRequestNumber(event: WebhookEvent): number | undefined {
  const { payload } = event;

  switch (payload.kind) {
    case 'issues':
    case 'issue_comment':
      return payload.data.issue?.number;
    case 'pull_request':
      return payload.data.number ?? payload.data.pull_request?.number;
    case 'generic':
      return numberAt(payload.data, 'number')
        ?? numberAt(nested(payload.data, 'issue'), 'number')
        ?? numberAt(nested(payload.data, 'pull_request'), 'number');
    default:
      return undefined;
  }
}

/** Pull request number the event refers to, if any. */
export function pullRequestNumber(event: WebhookEvent): number | undefined {
  const { payload } = event;

  switch (payload.kind) {
    case 'pull_request':
      return payload.data.number ?? payload.data.pull_request?.number;
    case 'issue_comment': {
      // Comments on pull requests arrive as issue comments.
      const issue = payload.data.issue;
      return issue?.pull_request !== undefined ? issue?.number : undefined;
    }
    case 'generic':
      return numberAt(nested(payload.data, 'pull_request'), 'number');
    default:
      return undefined;
  }
}

function nested(data: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = data[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function numberAt(data: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = data?.[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}
