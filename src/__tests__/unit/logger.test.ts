/**
 * Unit Tests - Logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, tagLogger } from '../../utils/logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop debug output unless debug is enabled', () => {
    createLogger().logDebug('hidden');
    createLogger({ debug: true }).logDebug('shown');

    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledWith('[Tether SDK] [DEBUG] shown', '');
  });

  it('should prefix warnings and errors', () => {
    const logger = createLogger();
    const error = new Error('boom');

    logger.logWarn('slow', { ms: 10 });
    logger.logError('failed', error);

    expect(console.warn).toHaveBeenCalledWith('[Tether SDK] [WARN] slow', { ms: 10 });
    expect(console.error).toHaveBeenCalledWith('[Tether SDK] [ERROR] failed', error);
  });

  it('should tag messages with the subsystem', () => {
    const logger = tagLogger(createLogger(), 'TRACK');

    logger.logWarn('Event will be sent as-is', { eventName: 'Add To Cart' });

    expect(console.warn).toHaveBeenCalledWith('[Tether SDK] [WARN] [TRACK] Event will be sent as-is', {
      eventName: 'Add To Cart',
    });
  });
});
