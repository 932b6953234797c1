import { describe, it, expect, vi, afterEach } from 'vitest';
import { ScopedLogger } from '../src/server/utils/ScopedLogger';

describe('ScopedLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes lines with the scope and nests child scopes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ScopedLogger('[ALERTS]');

    logger.info('started');
    logger.child('[SMTP]').error('login failed', 535);

    expect(log).toHaveBeenCalledWith('[ALERTS] started');
    expect(error).toHaveBeenCalledWith('[ALERTS][SMTP] login failed', 535);
  });

  it('prints nothing when disabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ScopedLogger('[ALERTS]', false);

    logger.warn('ignored');
    logger.child('[X]').warn('ignored too');

    expect(warn).not.toHaveBeenCalled();
  });
});
