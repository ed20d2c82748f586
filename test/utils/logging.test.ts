/**
 * Logger factory tests
 */

import { describe, it, expect } from 'vitest';
import { createPinoInstance, prepareLogData } from '../../src/utils/pino-core';
import { createLogger, silentLogger } from '../../src/utils/logging';

describe('createPinoInstance', () => {
  it('maps configured levels onto Pino levels', () => {
    expect(createPinoInstance({ level: 'DEBUG' }).level).toBe('debug');
    expect(createPinoInstance({ level: 'WARN' }).level).toBe('warn');
    expect(createPinoInstance({}).level).toBe('info');
  });

  it('tags every entry with the context', () => {
    const logger = createPinoInstance({ level: 'ERROR' }, 'DiskStore');

    expect(logger.bindings()).toEqual({ context: 'DiskStore' });
  });
});

describe('prepareLogData', () => {
  it('passes structured data through', () => {
    expect(prepareLogData({ path: '/tmp/a', size: 3, cached: false })).toEqual({ path: '/tmp/a', size: 3, cached: false });
    expect(prepareLogData()).toEqual({});
  });

  it('drops undefined fields', () => {
    const prepared = prepareLogData({ path: '/tmp/a', serviceId: undefined, stack: null });

    expect(prepared).toEqual({ path: '/tmp/a', stack: null });
    expect(Object.keys(prepared)).toEqual(['path', 'stack']);
  });
});

describe('createLogger', () => {
  it('exposes the full logger interface', () => {
    const logger = createLogger({ level: 'ERROR' }, 'Downloader');

    expect(Object.keys(logger).sort()).toEqual(['breadcrumb', 'debug', 'error', 'info', 'warn']);
    expect(() => logger.breadcrumb('Fetched original', 12, { locator: 'https://x/a' })).not.toThrow();
  });

  it('offers a silent logger', () => {
    expect(() => silentLogger.warn('ignored')).not.toThrow();
  });
});
