/**
 * Configuration management for the content cache
 *
 * Builds a validated {@link ContentCacheConfig} from code or from
 * `CONTENT_CACHE_*` environment variables.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  contentCacheConfigSchema,
  type ContentCacheConfig,
  type ContentCacheConfigInput
} from './schemas/configSchema';
import { ConfigurationError } from './errors/baseErrors';
import { isByteLimit } from './cache/diskStore';

export type { ContentCacheConfig, ContentCacheConfigInput } from './schemas/configSchema';

/**
 * Environment variables understood by {@link getConfigFromEnvironment}
 */
export type Env = Record<string, string | undefined>;

/**
 * Default directory where files are stored on disk
 */
export const DEFAULT_DIRECTORY = join(tmpdir(), 'tiered-content-cache');

export function megabytes(count: number): number {
  return count * 1_000_000;
}

/**
 * Validate a configuration object and fill in defaults
 *
 * @throws ConfigurationError when the input does not match the schema
 */
export function parseConfig(input: Partial<ContentCacheConfigInput> = {}): ContentCacheConfig {
  const result = contentCacheConfigSchema.safeParse({
    directory: DEFAULT_DIRECTORY,
    ...input
  });

  if (!result.success) {
    throw new ConfigurationError('Invalid content cache configuration', {
      issues: result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    });
  }

  return result.data;
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} must be an integer`, { value });
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

/**
 * Parse a byte limit written as a plain integer, or 'none' / 'unbounded'
 *
 * @param name Where the value came from, used in the error message
 * @throws ConfigurationError when the value is neither
 */
export function parseByteLimit(value: string, name = 'CONTENT_CACHE_BYTE_LIMIT'): number | null {
  if (value === 'none' || value === 'unbounded') return null;
  const parsed = Number(value);
  if (value.trim() === '' || !isByteLimit(parsed)) {
    throw new ConfigurationError(`${name} must be a non-negative integer number of bytes`, { value });
  }
  return parsed;
}

/**
 * Build the configuration from environment variables
 *
 * Unset variables fall back to schema defaults.
 */
export function getConfigFromEnvironment(env: Env = process.env): ContentCacheConfig {
  const level = env.CONTENT_CACHE_LOG_LEVEL?.toUpperCase();

  const input: Partial<ContentCacheConfigInput> = {
    removeAllFromMemoryOnBackground: parseBoolean(env.CONTENT_CACHE_CLEAR_MEMORY_ON_BACKGROUND),
    network: {
      requestTimeoutMs: parseInteger(env.CONTENT_CACHE_REQUEST_TIMEOUT_MS, 'CONTENT_CACHE_REQUEST_TIMEOUT_MS'),
      resourceTimeoutMs: parseInteger(env.CONTENT_CACHE_RESOURCE_TIMEOUT_MS, 'CONTENT_CACHE_RESOURCE_TIMEOUT_MS'),
      retry: {
        maxAttempts: parseInteger(env.CONTENT_CACHE_RETRY_ATTEMPTS, 'CONTENT_CACHE_RETRY_ATTEMPTS')
      }
    },
    logging: {
      level: level === 'DEBUG' || level === 'INFO' || level === 'WARN' || level === 'ERROR' ? level : undefined,
      prettyPrint: parseBoolean(env.CONTENT_CACHE_LOG_PRETTY),
      colorize: parseBoolean(env.CONTENT_CACHE_LOG_COLORIZE)
    }
  };

  if (env.CONTENT_CACHE_DIR) {
    input.directory = env.CONTENT_CACHE_DIR;
  }

  if (env.CONTENT_CACHE_BYTE_LIMIT) {
    input.byteLimit = parseByteLimit(env.CONTENT_CACHE_BYTE_LIMIT);
  }

  return parseConfig(input);
}
