import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, formatLogLine, logError } from '../observability/index.js';

describe('formatLogLine', () => {
  const timestamp = new Date('2024-01-01T00:00:00.000Z');

  it('should include the context as JSON', () => {
    expect(formatLogLine('warn', 'Tool invocation failed', { tool: 'scan' }, timestamp)).toBe(
      '[2024-01-01T00:00:00.000Z] [WARN] Tool invocation failed {"tool":"scan"}',
    );
  });

  it('should omit a missing context', () => {
    expect(formatLogLine('info', 'started', undefined, timestamp)).toBe('[2024-01-01T00:00:00.000Z] [INFO] started');
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write to stderr at or above its level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger('warn');

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');
    logger.error('also shown', { code: 'NOT_FOUND' });

    expect(stderr).toHaveBeenCalledTimes(2);
    expect(stderr.mock.calls[0]?.[0]).toMatch(/^\[[^\]]+\] \[WARN\] shown$/);
    expect(stderr.mock.calls[1]?.[0]).toMatch(/^\[[^\]]+\] \[ERROR\] also shown \{"code":"NOT_FOUND"\}$/);
    expect(stdout).not.toHaveBeenCalled();
  });
});

describe('logError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log errors with their name and message', () => {
    const logger = new NoopLogger();
    const error = vi.spyOn(logger, 'error');

    logError(logger, 'scan', new TypeError('bad'));

    expect(error).toHaveBeenCalledWith(
      'Simulator operation failed unexpectedly',
      expect.objectContaining({ operation: 'scan', errorName: 'TypeError', errorMessage: 'bad' }),
    );
  });

  it('should log thrown values that are not errors', () => {
    const logger = new NoopLogger();
    const error = vi.spyOn(logger, 'error');

    logError(logger, 'scan', 'plain');

    expect(error).toHaveBeenCalledWith('Simulator operation failed unexpectedly', {
      operation: 'scan',
      error: 'plain',
    });
  });
});
