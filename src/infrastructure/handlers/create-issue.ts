import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { requireRepository } from './github-context.js';
import { requireParam, stringListParam, stringParam } from './parameters.js';
import { substituteVariables } from './template.js';

/** `create_issue`: opens an issue in the event's repository. */
export class CreateIssueHandler implements ActionHandler {
  constructor(
    private readonly octokit: Octokit,
    private readonly log: Logger,
  ) {}

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const { owner, repo } = requireRepository(event);
    const params = action.parameters;

    const title = substituteVariables(stringParam(params, 'title') ?? '', event);
    const body = substituteVariables(stringParam(params, 'body') ?? '', event);
    const labels = stringListParam(params, 'labels') ?? [];
    const assignees = (stringListParam(params, 'assignees') ?? [])
      .map((login) => substituteVariables(login, event));

    const { data } = await this.octokit.rest.issues.create({
      owner,
      repo,
      title,
      body,
      labels,
      assignees,
      request: { signal },
    });

    this.log.info({ repo, number: data.number, title }, 'Created issue');
  }

  validateParameters(params: ActionParameters): void {
    requireParam(params, 'title');
    requireParam(params, 'body');
  }
}
