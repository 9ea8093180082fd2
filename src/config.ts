// MARK: - Configuration
// Environment-driven settings, resolved once at process start

import { ConfigError } from './utils/errors';
import { isLogLevel, type LogLevel } from './utils/logger';

export const DEFAULT_SUMMARY_LIMIT = 20;
const DEFAULT_PORT = 3000;

export interface AppConfig {
  botToken: string;
  appToken: string;
  /** Members never counted in a channel's population. */
  excludedUserIds: ReadonlySet<string>;
  summaryLimit: number;
  port: number;
  /** True when PORT was set explicitly; the health server will not fall back to another port. */
  portPinned: boolean;
  logLevel: LogLevel;
}

function parseIdList(raw: string | undefined): ReadonlySet<string> {
  return new Set(
    (raw ?? '')
      .split(',')
      .map(id => id.trim())
      .filter(id => id.length > 0),
  );
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const botToken = env.SLACK_BOT_TOKEN;
  const appToken = env.SLACK_APP_TOKEN;

  const missing = [
    botToken ? null : 'SLACK_BOT_TOKEN',
    appToken ? null : 'SLACK_APP_TOKEN',
  ].filter((name): name is string => name !== null);

  if (!botToken || !appToken) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const logLevel = env.LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '' && !isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    botToken,
    appToken,
    excludedUserIds: parseIdList(env.EXCLUDED_USER_IDS),
    summaryLimit: parsePositiveInt('SUMMARY_LIMIT', env.SUMMARY_LIMIT, DEFAULT_SUMMARY_LIMIT),
    port: parsePositiveInt('PORT', env.PORT, DEFAULT_PORT),
    portPinned: Boolean(env.PORT),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
