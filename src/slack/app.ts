// Slack app setup

import { App, LogLevel } from '@slack/bolt';
import type { SlackConfig } from '../config.js';
import type { SessionOrchestrator } from '../orchestrator/index.js';
import { createLogger } from '../shared/logger.js';
import { SlackMessageHandler } from './handlers.js';
import { ThreadResponder } from './responder.js';

const log = createLogger('SlackApp');

export class SlackApp {
  private app: App;
  private handler: SlackMessageHandler;

  constructor(config: SlackConfig, orchestrator: SessionOrchestrator) {
    this.app = new App({
      token: config.botToken,
      appToken: config.appToken,
      signingSecret: config.signingSecret,
      socketMode: true,
      logLevel: config.logLevel || LogLevel.INFO
    });

    this.handler = new SlackMessageHandler(this.app, new ThreadResponder(orchestrator), {
      auditChannel: config.auditChannel
    });
  }

  async start(): Promise<void> {
    this.handler.setup();
    await this.app.start();
    log.info('Bot started successfully');
  }

  async stop(): Promise<void> {
    await this.app.stop();
    log.info('Bot stopped');
  }
}
