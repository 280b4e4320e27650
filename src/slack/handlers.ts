// Slack message handlers

import type { App, types } from '@slack/bolt';
import { createLogger } from '../shared/logger.js';
import { hasMention, truncate } from '../shared/slack.js';
import type { ThreadMessage, ThreadResponder } from './responder.js';

const log = createLogger('SlackHandlers');

export interface MessageHandlerConfig {
  auditChannel?: string;
}

export class SlackMessageHandler {
  constructor(
    private app: App,
    private responder: ThreadResponder,
    private config: MessageHandlerConfig = {}
  ) {}

  // Log to audit channel
  private async auditLog(message: string): Promise<void> {
    if (!this.config.auditChannel) {
      return;
    }

    const timestamp = new Date().toISOString();
    try {
      await this.app.client.chat.postMessage({
        channel: this.config.auditChannel,
        text: `\`${timestamp}\` ${message}`,
        unfurl_links: false,
        unfurl_media: false
      });
    } catch (error) {
      log.error('Failed to post audit log:', error);
    }
  }

  // Set up all message handlers
  setup(): void {
    // Thread replies in threads that already have a session
    this.app.message(async ({ message }) => {
      if (message.subtype !== undefined) {
        return;
      }
      await this.handleMessage(message);
    });

    // @mentions start a session in a new thread
    this.app.event('app_mention', async ({ event }) => {
      await this.process(
        {
          channel: event.channel,
          threadTs: event.thread_ts ?? event.ts,
          text: event.text,
          userId: event.user
        },
        'mention'
      );
    });
  }

  private async handleMessage(message: types.GenericMessageEvent): Promise<void> {
    // Ignore bot messages to prevent loops
    if (message.bot_id || !message.text || !message.thread_ts) {
      return;
    }

    // Mentions arrive through app_mention as well
    if (hasMention(message.text)) {
      return;
    }

    if (!this.responder.hasSession(message.channel, message.thread_ts)) {
      return;
    }

    await this.process(
      {
        channel: message.channel,
        threadTs: message.thread_ts,
        text: message.text,
        userId: message.user
      },
      'reply'
    );
  }

  private async process(message: ThreadMessage, kind: 'mention' | 'reply'): Promise<void> {
    const startTime = Date.now();
    await this.auditLog(`📥 *${kind}* | User: <@${message.userId ?? 'unknown'}> | Channel: <#${message.channel}> | Text: "${truncate(message.text, 100)}"`);

    try {
      const reply = kind === 'mention'
        ? await this.responder.onMention(message)
        : await this.responder.onReply(message);

      await this.app.client.chat.postMessage({
        channel: message.channel,
        thread_ts: message.threadTs,
        text: reply
      });

      await this.auditLog(`📤 *Response* | Duration: ${Date.now() - startTime}ms | Preview: "${truncate(reply, 80)}"`);
    } catch (error) {
      log.error('Failed to handle message:', error);
      await this.auditLog(`❌ *Error* | Duration: ${Date.now() - startTime}ms | Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
