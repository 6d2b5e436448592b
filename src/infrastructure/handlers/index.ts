import type { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { RuleEngine } from '../../application/rule-engine.js';
import { AddLabelHandler } from './add-label.js';
import { CreateCommentHandler } from './create-comment.js';
import { CreateIssueHandler } from './create-issue.js';
import { MergePullRequestHandler } from './merge-pr.js';
import { NotificationHandler } from './notification.js';
import { RunWorkflowHandler } from './run-workflow.js';

export { AddLabelHandler } from './add-label.js';
export { CreateCommentHandler } from './create-comment.js';
export { CreateIssueHandler } from './create-issue.js';
export { MergePullRequestHandler } from './merge-pr.js';
export { NotificationHandler } from './notification.js';
export { RunWorkflowHandler } from './run-workflow.js';
export { substituteVariables } from './template.js';

export interface DefaultHandlerDeps {
  readonly octokit: Octokit;
  readonly log: Logger;
  /** Notification type -> incoming webhook URL. */
  readonly notificationUrls: Readonly<Record<string, string>>;
}

/** Registers the six bundled action handlers on the engine. */
export function registerDefaultHandlers(engine: RuleEngine, deps: DefaultHandlerDeps): void {
  const { octokit, log } = deps;

  const notifications = new NotificationHandler(log);
  for (const [type, url] of Object.entries(deps.notificationUrls)) {
    notifications.registerWebhook(type, url);
  }

  engine.registerHandler('create_issue', new CreateIssueHandler(octokit, log));
  engine.registerHandler('add_label', new AddLabelHandler(octokit, log));
  engine.registerHandler('create_comment', new CreateCommentHandler(octokit, log));
  engine.registerHandler('merge_pr', new MergePullRequestHandler(octokit, log));
  engine.registerHandler('notification', notifications);
  engine.registerHandler('run_workflow', new RunWorkflowHandler(octokit, log));
}
