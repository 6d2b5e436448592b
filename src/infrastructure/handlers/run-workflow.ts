import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { requireRepository } from './github-context.js';
import { recordParam, requireParam, stringParam } from './parameters.js';

/** `run_workflow`: dispatches a GitHub Actions workflow by file name. */
export class RunWorkflowHandler implements ActionHandler {
  constructor(
    private readonly octokit: Octokit,
    private readonly log: Logger,
  ) {}

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const { owner, repo, repository } = requireRepository(event);

    const workflowFile = stringParam(action.parameters, 'workflow_file');
    if (workflowFile === undefined) {
      throw new Error('workflow_file parameter is required');
    }

    const ref = stringParam(action.parameters, 'ref') || repository.default_branch;
    const inputs = recordParam(action.parameters, 'inputs');

    await this.octokit.rest.actions.createWorkflowDispatch({
      owner,
      repo,
      workflow_id: workflowFile,
      ref,
      ...(inputs !== undefined ? { inputs } : {}),
      request: { signal },
    });

    this.log.info({ repo, workflow: workflowFile, ref }, 'Triggered workflow');
  }

  validateParameters(params: ActionParameters): void {
    requireParam(params, 'workflow_file');
  }
}
