// Slack entry point for the post refinery

import 'dotenv/config';
import { initializeDatabase, closeDatabase } from './db/index.js';
import { SessionOrchestrator } from './orchestrator/index.js';
import { SlackApp } from './slack/app.js';
import { loadConfig, loadSlackConfig } from './config.js';
import { LLMClient } from './shared/llm.js';
import { createLogger, setLogLevel } from './shared/logger.js';

const log = createLogger('Main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info('Configuration loaded');

  const db = await initializeDatabase({ path: config.database.path });
  log.info('Database initialized');

  const orchestrator = new SessionOrchestrator(db, new LLMClient(config.llm), config.workflow);

  const slackApp = new SlackApp(loadSlackConfig(), orchestrator);
  await slackApp.start();

  const shutdown = async () => {
    log.info('Shutting down...');
    await slackApp.stop();
    closeDatabase();
    log.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  log.info('Post refinery is running');
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
