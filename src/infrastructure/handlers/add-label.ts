import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { issueOrPullRequestNumber, requireRepository } from './github-context.js';
import { requireParam, stringListParam } from './parameters.js';

/** `add_label`: labels the issue or pull request the event refers to. */
export class AddLabelHandler implements ActionHandler {
  constructor(
    private readonly octokit: Octokit,
    private readonly log: Logger,
  ) {}

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const { owner, repo } = requireRepository(event);

    const labels = stringListParam(action.parameters, 'labels');
    if (labels === undefined) {
      throw new Error('labels parameter must be a string array');
    }

    const number = issueOrPullRequestNumber(event);
    if (number === undefined) {
      throw new Error('could not determine issue/PR number from event');
    }

    await this.octokit.rest.issues.addLabels({
      owner,
      repo,
      issue_number: number,
      labels,
      request: { signal },
    });

    this.log.info({ repo, number, labels }, 'Added labels');
  }

  validateParameters(params: ActionParameters): void {
    requireParam(params, 'labels');
  }
}
