import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { logger } from './logger.js';

vi.mock('./config.js', () => ({
  config: {
    app: {
      logLevel: 'info',
      logFormat: 'json',
    },
  },
}));

describe('logger', () => {
  let output: MockInstance;

  beforeEach(() => {
    output = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    output.mockRestore();
  });

  it('should drop messages below the configured level', () => {
    logger.debug('hidden');

    expect(output).not.toHaveBeenCalled();
  });

  it('should write one JSON line with message and metadata', () => {
    logger.warn('Auction request failed', { auctionId: 4 });

    expect(output).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(output.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'warn', message: 'Auction request failed', auctionId: 4 });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should tag child logger entries with their component path', () => {
    logger.child('harvest').child('page').info('Recorded');

    const entry = JSON.parse(String(output.mock.calls[0][0]));
    expect(entry.component).toBe('harvest:page');
  });
});
