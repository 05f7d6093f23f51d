import { afterEach, describe, expect, it, vi } from 'vitest';

import { childLogger, consoleLogger } from './logger';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages and passes details through', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = consoleLogger('test');

    logger.info('hello');
    logger.info('with details', { id: 1 });

    expect(log).toHaveBeenNthCalledWith(1, '[test] hello');
    expect(log).toHaveBeenNthCalledWith(2, '[test] with details', { id: 1 });
  });

  it('only enables debug output when verbose', () => {
    expect(consoleLogger('test').debug).toBeUndefined();
    expect(consoleLogger('test', { verbose: true }).debug).toBeTypeOf('function');
  });

  it('keeps info off stdout when asked to', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = consoleLogger('test', { stderr: true });

    logger.info('quiet');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[test] quiet');
  });

  it('scopes child logger messages', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = childLogger(consoleLogger('test'), 'session abc');

    logger.warn('reconnecting', { attempt: 1 });

    expect(warn).toHaveBeenCalledWith('[test] session abc: reconnecting', { attempt: 1 });
  });
});
