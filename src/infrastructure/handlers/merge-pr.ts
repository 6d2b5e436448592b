import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { pullRequestNumber, requireRepository } from './github-context.js';
import { stringParam } from './parameters.js';

const MERGE_METHODS = ['merge', 'squash', 'rebase'] as const;
type MergeMethod = (typeof MERGE_METHODS)[number];

function isMergeMethod(value: string): value is MergeMethod {
  return MERGE_METHODS.some((method) => method === value);
}

/** `merge_pr`: merges the pull request the event refers to. */
export class MergePullRequestHandler implements ActionHandler {
  constructor(
    private readonly octokit: Octokit,
    private readonly log: Logger,
  ) {}

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const { owner, repo } = requireRepository(event);

    const number = pullRequestNumber(event);
    if (number === undefined) {
      throw new Error('could not determine PR number from event');
    }

    const requested = stringParam(action.parameters, 'merge_method') || 'merge';
    if (!isMergeMethod(requested)) {
      throw new Error('invalid merge_method: must be one of merge, squash, rebase');
    }
    const commitMessage = stringParam(action.parameters, 'commit_message');

    const { data } = await this.octokit.rest.pulls.merge({
      owner,
      repo,
      pull_number: number,
      merge_method: requested,
      ...(commitMessage ? { commit_message: commitMessage } : {}),
      request: { signal },
    });

    this.log.info({ repo, number, sha: data.sha }, 'Merged pull request');
  }

  validateParameters(params: ActionParameters): void {
    const method = stringParam(params, 'merge_method');
    if (method !== undefined && !isMergeMethod(method)) {
      throw new Error('invalid merge_method: must be one of merge, squash, rebase');
    }
  }
}
