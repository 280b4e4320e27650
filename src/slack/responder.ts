// Turns thread messages into orchestrator calls and reply text

import type { SessionOrchestrator, SessionOutcome } from '../orchestrator/index.js';
import { getUserFriendlyError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { buildThreadKey, formatError, formatSessionReply, stripBotMention } from '../shared/slack.js';
import { HELP_TEXT, interpretMention, interpretReply } from './intents.js';

const log = createLogger('SlackResponder');

export interface ThreadMessage {
  channel: string;
  threadTs: string;
  text: string;
  userId?: string;
}

export class ThreadResponder {
  constructor(private orchestrator: SessionOrchestrator) {}

  hasSession(channel: string, threadTs: string): boolean {
    return this.orchestrator.get(buildThreadKey(channel, threadTs)) !== null;
  }

  // An @mention starts a session, or acts as a reply inside an existing one
  async onMention(message: ThreadMessage): Promise<string> {
    const text = stripBotMention(message.text);
    if (this.hasSession(message.channel, message.threadTs)) {
      return this.onReply({ ...message, text });
    }

    const intent = interpretMention(text);
    if (intent.type === 'help') {
      return HELP_TEXT;
    }

    const sessionId = buildThreadKey(message.channel, message.threadTs);
    log.info(`Starting session ${sessionId} for ${message.userId ?? 'unknown user'}`);

    return this.describe(() => this.orchestrator.start({
      sourceContent: intent.sourceContent,
      contentInsights: intent.insights,
      requirements: intent.requirements
    }, sessionId));
  }

  async onReply(message: ThreadMessage): Promise<string> {
    const sessionId = buildThreadKey(message.channel, message.threadTs);
    const intent = interpretReply(stripBotMention(message.text));

    switch (intent.type) {
      case 'help':
        return HELP_TEXT;
      case 'status': {
        const stored = this.orchestrator.get(sessionId);
        return stored ? formatSessionReply(stored.state) : formatError('No session in this thread.');
      }
      case 'approve':
        return this.describe(() => this.orchestrator.approve(sessionId));
      case 'feedback':
        return this.describe(() => this.orchestrator.feedback(sessionId, { message: intent.message }));
    }
  }

  private async describe(action: () => Promise<SessionOutcome>): Promise<string> {
    try {
      const outcome = await action();
      if (outcome.kind === 'busy') {
        return outcome.message;
      }
      return formatSessionReply(outcome.session.state);
    } catch (error) {
      log.error('Session action failed:', error);
      return formatError(getUserFriendlyError(error));
    }
  }
}
