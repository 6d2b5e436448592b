import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { issueOrPullRequestNumber, requireRepository } from './github-context.js';
import { requireParam, stringParam } from './parameters.js';
import { substituteVariables } from './template.js';

/** `create_comment`: comments on the issue or pull request the event refers to. */
export class CreateCommentHandler implements ActionHandler {
  constructor(
    private readonly octokit: Octokit,
    private readonly log: Logger,
  ) {}

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const { owner, repo } = requireRepository(event);

    const template = stringParam(action.parameters, 'body');
    if (template === undefined) {
      throw new Error('body parameter is required');
    }

    const number = issueOrPullRequestNumber(event);
    if (number === undefined) {
      throw new Error('could not determine issue/PR number from event');
    }

    await this.octokit.rest.issues.createComment({
      owner,
      repo,
      issue_number: number,
      body: substituteVariables(template, event),
      request: { signal },
    });

    this.log.info({ repo, number }, 'Created comment');
  }

  validateParameters(params: ActionParameters): void {
    requireParam(params, 'body');
  }
}
