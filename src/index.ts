// MARK: - Main Bot Entry Point
// Slack app initialization over Socket Mode

import 'dotenv/config';
import { App } from '@slack/bolt';
import { WebClient } from '@slack/web-api';
import { loadConfig, type AppConfig } from './config';
import { registerCommands } from './commands';
import { createHealthApp, startHealthServer, stopHealthServer } from './health';
import { ReconciliationEngine } from './services/ReconciliationEngine';
import { DirectMessenger } from './services/slack/DirectMessenger';
import { SlackWorkspaceApi } from './services/slack/SlackWorkspaceApi';
import { describeError } from './utils/errors';
import { InflightGuard } from './utils/inflightGuard';
import { BoltLogger, logger, setLogLevel } from './utils/logger';

// MARK: - Configuration
let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error('Invalid configuration', { error: describeError(error) });
  process.exit(1);
}

setLogLevel(config.logLevel);

// MARK: - Slack Setup
const app = new App({
  token: config.botToken,
  appToken: config.appToken,
  socketMode: true,
  logger: new BoltLogger(),
});

const client = new WebClient(config.botToken);
const guard = new InflightGuard();
let slackConnected = false;

registerCommands(app, {
  engine: new ReconciliationEngine(new SlackWorkspaceApi(client), {
    excludedUserIds: config.excludedUserIds,
  }),
  messenger: new DirectMessenger(client),
  guard,
  summaryLimit: config.summaryLimit,
});

app.error(async error => {
  logger.error('Unhandled Bolt error', { error: error.message, code: error.code });
});

// MARK: - Startup
async function start(): Promise<void> {
  await app.start();
  slackConnected = true;
  logger.info('Slack app connected', {
    excludedUsers: config.excludedUserIds.size,
    summaryLimit: config.summaryLimit,
  });

  const healthApp = createHealthApp({
    isSlackConnected: () => slackConnected,
    getInflightCount: () => guard.getActiveCount(),
  });
  await startHealthServer(healthApp, config.port, !config.portPinned);
  logger.info('Bot ready and operational');
}

// MARK: - Graceful Shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    await stopHealthServer();
    await app.stop();
    slackConnected = false;
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: describeError(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled promise rejection', { error: describeError(reason) });
});

start().catch(error => {
  logger.error('Failed to start bot', {
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
