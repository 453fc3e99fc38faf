import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../src/base/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefix info and warn output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Reader', { enableDebug: false });

    logger.info('loaded', 3);
    logger.warn('careful');

    expect(log).toHaveBeenCalledWith('[Reader]', 'loaded', 3);
    expect(warn).toHaveBeenCalledWith('[Reader]', 'careful');
  });

  it('should drop debug output unless enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('Reader', { enableDebug: false }).debug('hidden');
    expect(log).not.toHaveBeenCalled();

    createLogger('Reader', { enableDebug: true }).debug('shown');
    expect(log).toHaveBeenCalledWith('[Reader]', 'shown');
  });

  it('should send errors to console.error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('Reader').error('failed');

    expect(error).toHaveBeenCalledWith('[Reader]', 'failed');
  });
});
