/**
 * Cache specific error types
 */

import { ServiceError, type ErrorDetails } from './baseErrors';

/**
 * Base error class for cache errors
 */
export class CacheServiceError extends ServiceError {
  constructor(
    message: string,
    options: {
      code?: string,
      details?: ErrorDetails,
      retryable?: boolean,
      cause?: unknown
    } = {}
  ) {
    super(message, 'DiskStore', {
      ...options,
      code: options.code || 'CACHE_SERVICE_ERROR'
    });
  }
}

/**
 * Error when writing an artifact to disk fails
 */
export class CacheWriteError extends CacheServiceError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, {
      code: 'CACHE_WRITE_ERROR',
      details,
      retryable: true,
      cause
    });
  }
}

/**
 * Error when reading an artifact from disk fails for a reason other than absence
 */
export class CacheReadError extends CacheServiceError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, {
      code: 'CACHE_READ_ERROR',
      details,
      retryable: true,
      cause
    });
  }
}

/**
 * Error when a file could not be removed during a byte-budget trim
 */
export class DiskTrimError extends CacheServiceError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, {
      code: 'DISK_TRIM_ERROR',
      details,
      retryable: false,
      cause
    });
  }
}
