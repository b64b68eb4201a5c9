import { transports } from 'winston';
import { describe, expect, it } from 'vitest';
import logger from '../logger.js';

describe('logger', () => {
  it('exposes the levels the handler logs at', () => {
    expect(typeof logger.error).toBe('function');
    expect(typeof logger.warn).toBe('function');
    expect(typeof logger.http).toBe('function');
    expect(typeof logger.debug).toBe('function');
  });

  it('writes to a single console transport', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(transports.Console);
  });
});
