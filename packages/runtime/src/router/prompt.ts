import type { Session } from '@helix/core';
import nunjucks from 'nunjucks';

const templates = new nunjucks.Environment(null, { autoescape: false });

/**
 * Renders the conversation system prompt. Templates see `session` (id, owner,
 * message count) and `context`, the session's stored context values.
 */
export function renderSystemPrompt(template: string, session: Session): string {
  return templates.renderString(template, {
    session: { id: session.id, ownerId: session.ownerId, messageCount: session.messageCount },
    context: session.contextEntries()
  });
}
