import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConsoleLogger, isLogLevel, logDebug, logError, logInfo, logWarning } from '../logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('module-level log functions', () => {
  it.each([
    ['logInfo', logInfo, 'error'],
    ['logWarning', logWarning, 'warn'],
    ['logError', logError, 'error'],
    ['logDebug', logDebug, 'error'],
  ] as const)('%s writes to stderr through console.%s', (_name, log, method) => {
    const spy = vi.spyOn(console, method).mockImplementation(() => {});

    log('job started');
    log('job queued', {});
    log('job failed', { jobId: 'job-1' });

    expect(spy.mock.calls).toEqual([['job started'], ['job queued'], ['job failed', { jobId: 'job-1' }]]);
  });
});

describe('createConsoleLogger', () => {
  it('drops messages below the configured level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'warn' });

    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('loud');
  });

  it('prefixes messages and keeps the context object', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'debug', prefix: 'jobs' });

    logger.debug('tick', { attempt: 2 });

    expect(spy).toHaveBeenCalledWith('[jobs] tick', { attempt: 2 });
  });

  it('recognises level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
