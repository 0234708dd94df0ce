import { describe, it, expect, vi, afterEach } from 'vitest';
import { logger, setLogLevel } from '../../packages/lk-cli/src/lib/logger.js';

afterEach(() => {
  setLogLevel(undefined);
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('exposes only the levels the commands print with', () => {
    expect(Object.keys(logger).sort()).toEqual(['blank', 'dim', 'done', 'error', 'header', 'success', 'verbose', 'warn']);
  });

  it('drops messages below the configured level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('warn');

    logger.success('listed');
    logger.verbose('details');
    logger.warn('disk nearly full');

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(err).toHaveBeenCalledWith(expect.stringContaining('disk nearly full'));
  });

  it('prints verbose detail once the level allows it', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('verbose');

    logger.verbose('forwarding SIGTERM');

    expect(err).toHaveBeenCalledWith(expect.stringContaining('forwarding SIGTERM'));
  });
});
