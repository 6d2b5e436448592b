import type { WebhookEvent } from '../../domain/index.js';

/**
 * Replaces `{{event.*}}`, `{{repo.*}}` and `{{sender.*}}` placeholders
 * with values from the event. Placeholders for an absent repository or
 * sender become empty strings; unknown placeholders are left as written.
 */
export function substituteVariables(template: string, event: WebhookEvent): string {
  const replacements: Record<string, string> = {
    '{{event.type}}': event.type,
    '{{event.action}}': event.action,
    '{{event.id}}': event.id,
    '{{repo.name}}': event.repository?.name ?? '',
    '{{repo.full_name}}': event.repository?.full_name ?? '',
    '{{sender.login}}': event.sender?.login ?? '',
  };

  let result = template;
  for (const [key, value] of Object.entries(replacements)) {
    result = result.replaceAll(key, () => value);
  }
  return result;
}
