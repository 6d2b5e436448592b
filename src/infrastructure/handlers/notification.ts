import type { Logger } from 'pino';
import type { Action, ActionHandler, ActionParameters, WebhookEvent } from '../../domain/index.js';
import { requireParam, stringParam } from './parameters.js';
import { substituteVariables } from './template.js';

/**
 * `notification`: posts a message to an incoming-webhook URL registered
 * under the action's `type` (default `"default"`).
 *
 * Discord URLs (or the `discord` type) get `{ content }`; everything else
 * is treated as a Slack-style `{ text }` webhook.
 */
export class NotificationHandler implements ActionHandler {
  private readonly webhooks = new Map<string, string>();

  constructor(private readonly log: Logger) {}

  registerWebhook(notificationType: string, url: string): void {
    this.webhooks.set(notificationType, url);
  }

  async execute(event: WebhookEvent, action: Action, signal: AbortSignal): Promise<void> {
    const notificationType = stringParam(action.parameters, 'type') || 'default';

    const template = stringParam(action.parameters, 'message');
    if (!template) {
      throw new Error('message parameter is required');
    }
    const message = substituteVariables(template, event);

    const url = this.webhooks.get(notificationType);
    if (url === undefined) {
      throw new Error(`no webhook configured for notification type: ${notificationType}`);
    }

    const body = isDiscord(notificationType, url) ? { content: message } : { text: message };

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      throw new Error(`notification webhook returned status ${response.status}`);
    }

    this.log.info({ type: notificationType, event_id: event.id }, 'Sent notification');
  }

  validateParameters(params: ActionParameters): void {
    requireParam(params, 'message');
  }
}

function isDiscord(notificationType: string, url: string): boolean {
  if (notificationType === 'discord') return true;
  try {
    const host = new URL(url).hostname;
    return host === 'discord.com' || host.endsWith('.discord.com') || host === 'discordapp.com';
  } catch {
    return false;
  }
}
