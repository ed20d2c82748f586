/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_DIRECTORY, getConfigFromEnvironment, megabytes, parseByteLimit, parseConfig } from '../src/config';
import { ConfigurationError } from '../src/errors/baseErrors';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig()).toEqual({
      directory: DEFAULT_DIRECTORY,
      byteLimit: 500_000_000,
      removeAllFromMemoryOnBackground: false,
      network: {
        requestTimeoutMs: 15_000,
        resourceTimeoutMs: 90_000,
        retry: { maxAttempts: 1, initialDelayMs: 200, maxDelayMs: 2000 }
      },
      logging: { level: 'INFO', includeTimestamp: true, prettyPrint: false, colorize: false }
    });
  });

  it('accepts an unbounded byte limit', () => {
    expect(parseConfig({ byteLimit: null }).byteLimit).toBeNull();
  });

  it('rejects invalid values with the failing paths', () => {
    let caught: unknown;
    try {
      parseConfig({ byteLimit: -1, directory: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.code).toBe('CONFIGURATION_ERROR');
    const issues = caught.details?.issues;
    expect(Array.isArray(issues) && issues.map(issue => issue.split(':')[0])).toEqual(['directory', 'byteLimit']);
  });
});

describe('getConfigFromEnvironment', () => {
  it('uses defaults for an empty environment', () => {
    expect(getConfigFromEnvironment({})).toEqual(parseConfig());
  });

  it('maps CONTENT_CACHE_* variables', () => {
    const config = getConfigFromEnvironment({
      CONTENT_CACHE_DIR: '/var/cache/content',
      CONTENT_CACHE_BYTE_LIMIT: String(megabytes(50)),
      CONTENT_CACHE_CLEAR_MEMORY_ON_BACKGROUND: '1',
      CONTENT_CACHE_REQUEST_TIMEOUT_MS: '5000',
      CONTENT_CACHE_RESOURCE_TIMEOUT_MS: '20000',
      CONTENT_CACHE_RETRY_ATTEMPTS: '3',
      CONTENT_CACHE_LOG_LEVEL: 'debug',
      CONTENT_CACHE_LOG_PRETTY: 'true',
      CONTENT_CACHE_LOG_COLORIZE: 'false'
    });

    expect(config).toEqual({
      directory: '/var/cache/content',
      byteLimit: 50_000_000,
      removeAllFromMemoryOnBackground: true,
      network: {
        requestTimeoutMs: 5000,
        resourceTimeoutMs: 20_000,
        retry: { maxAttempts: 3, initialDelayMs: 200, maxDelayMs: 2000 }
      },
      logging: { level: 'DEBUG', includeTimestamp: true, prettyPrint: true, colorize: false }
    });
  });

  it('reads an unbounded byte limit', () => {
    expect(getConfigFromEnvironment({ CONTENT_CACHE_BYTE_LIMIT: 'none' }).byteLimit).toBeNull();
  });

  it('rejects byte limits that are not whole byte counts', () => {
    expect(() => getConfigFromEnvironment({ CONTENT_CACHE_BYTE_LIMIT: '10MB' }))
      .toThrow('CONTENT_CACHE_BYTE_LIMIT must be a non-negative integer number of bytes');
  });

  it('ignores unknown log levels', () => {
    expect(getConfigFromEnvironment({ CONTENT_CACHE_LOG_LEVEL: 'verbose' }).logging.level).toBe('INFO');
  });

  it('rejects non-integer numbers', () => {
    expect(() => getConfigFromEnvironment({ CONTENT_CACHE_RETRY_ATTEMPTS: 'three' }))
      .toThrow('Environment variable CONTENT_CACHE_RETRY_ATTEMPTS must be an integer');
  });
});

describe('parseByteLimit', () => {
  it('reads whole byte counts', () => {
    expect(parseByteLimit('0')).toBe(0);
    expect(parseByteLimit('1000000')).toBe(1_000_000);
  });

  it('reads unbounded limits', () => {
    expect(parseByteLimit('none')).toBeNull();
    expect(parseByteLimit('unbounded')).toBeNull();
  });

  it('rejects anything else', () => {
    for (const value of ['abc', '10MB', '-1', '1.5', '', ' ']) {
      expect(() => parseByteLimit(value, '--limit')).toThrow(ConfigurationError);
    }
    expect(() => parseByteLimit('abc', '--limit')).toThrow('--limit must be a non-negative integer number of bytes');
  });
});
