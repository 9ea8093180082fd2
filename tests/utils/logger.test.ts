import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel } from '@slack/bolt';
import { BoltLogger, getLogLevel, logger, setLogLevel } from '../../src/utils/logger';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes structured JSON with metadata', () => {
    setLogLevel('info');
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('Non-engagers computed', { channelId: 'C1', nonEngaged: 3 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'INFO', message: 'Non-engagers computed', channelId: 'C1', nonEngaged: 3 });
  });

  it('drops entries below the configured level', () => {
    setLogLevel('warn');
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('lets Bolt drive and read the shared level', () => {
    const boltLogger = new BoltLogger();

    boltLogger.setLevel(LogLevel.ERROR);

    expect(getLogLevel()).toBe('error');
    expect(boltLogger.getLevel()).toBe(LogLevel.ERROR);
  });

  it('joins Bolt argument lists into one message tagged with the logger name', () => {
    setLogLevel('debug');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const boltLogger = new BoltLogger();
    boltLogger.setName('socket-mode');

    boltLogger.error('failed:', new Error('timeout'), { attempt: 2 });

    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'ERROR', message: 'failed: timeout {"attempt":2}', source: 'socket-mode' });
  });
});
