// MARK: - Logger Utility
// Structured JSON logging with level filtering, shared with Bolt

import { LogLevel as BoltLogLevel, type Logger as BoltLoggerContract } from '@slack/bolt';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLogLevel = process.env.LOG_LEVEL;
let currentLogLevel: LogLevel = isLogLevel(envLogLevel) ? envLogLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Main logger function with level filtering
 */
export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) {
    return;
  }

  const output = JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    message,
    ...meta,
  });

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),
};

const TO_BOLT: Record<LogLevel, BoltLogLevel> = {
  debug: BoltLogLevel.DEBUG,
  info: BoltLogLevel.INFO,
  warn: BoltLogLevel.WARN,
  error: BoltLogLevel.ERROR,
};

const FROM_BOLT: Record<BoltLogLevel, LogLevel> = {
  [BoltLogLevel.DEBUG]: 'debug',
  [BoltLogLevel.INFO]: 'info',
  [BoltLogLevel.WARN]: 'warn',
  [BoltLogLevel.ERROR]: 'error',
};

/**
 * Routes Bolt's own log lines through the structured logger.
 * Bolt passes loose argument lists; they are joined into the message.
 */
export class BoltLogger implements BoltLoggerContract {
  private name = 'bolt';

  debug(...msg: unknown[]): void {
    this.write('debug', msg);
  }

  info(...msg: unknown[]): void {
    this.write('info', msg);
  }

  warn(...msg: unknown[]): void {
    this.write('warn', msg);
  }

  error(...msg: unknown[]): void {
    this.write('error', msg);
  }

  setLevel(level: BoltLogLevel): void {
    setLogLevel(FROM_BOLT[level]);
  }

  getLevel(): BoltLogLevel {
    return TO_BOLT[currentLogLevel];
  }

  setName(name: string): void {
    this.name = name;
  }

  private write(level: LogLevel, parts: unknown[]): void {
    const message = parts
      .map(part => (part instanceof Error ? part.message : typeof part === 'string' ? part : JSON.stringify(part)))
      .join(' ');
    log(level, message, { source: this.name });
  }
}
