/**
 * Base error types for the content cache
 *
 * This module contains the base error classes that all service-specific
 * errors extend from. None of these cross the public boundary of the
 * cache: they are raised internally, logged, and collapsed into a `null`
 * result before any caller sees them.
 */

/**
 * Type for error details with structured information
 */
export type ErrorDetails = Record<string, string | number | boolean | null | undefined | string[] | Record<string, string | number | boolean | null | undefined>>;

/**
 * Base application error class
 */
export class AppError extends Error {
  code: string;
  details?: ErrorDetails;
  retryable: boolean;
  serviceId?: string;

  constructor(message: string, options: {
    code?: string,
    details?: ErrorDetails,
    retryable?: boolean,
    serviceId?: string,
    cause?: unknown
  } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.details = options.details;
    this.retryable = options.retryable || false;
    this.serviceId = options.serviceId;
  }
}

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends AppError {
  constructor(
    message: string,
    serviceId: string,
    options: {
      code?: string,
      details?: ErrorDetails,
      retryable?: boolean,
      cause?: unknown
    } = {}
  ) {
    super(message, {
      ...options,
      serviceId,
      code: options.code || 'SERVICE_ERROR'
    });
  }
}

/**
 * Validation errors that represent invalid input or parameters
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, {
      code: 'VALIDATION_ERROR',
      details,
      retryable: false
    });
  }
}

/**
 * Network-related errors that might be retryable
 */
export class NetworkError extends AppError {
  constructor(message: string, options: {
    retryable?: boolean,
    details?: ErrorDetails,
    cause?: unknown
  } = {}) {
    super(message, {
      code: 'NETWORK_ERROR',
      retryable: options.retryable !== undefined ? options.retryable : true, // Network errors are retryable by default
      details: options.details,
      cause: options.cause
    });
  }
}

/**
 * Timeout errors that represent operations that took too long
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: {
    retryable?: boolean,
    details?: ErrorDetails,
    cause?: unknown
  } = {}) {
    super(message, {
      code: 'TIMEOUT_ERROR',
      retryable: options.retryable !== undefined ? options.retryable : true,
      details: options.details,
      cause: options.cause
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      details,
      retryable: false
    });
  }
}

/**
 * Flatten any thrown value into loggable fields
 */
export function errorDetails(error: unknown): Record<string, string | boolean | undefined> {
  if (error instanceof AppError) {
    return {
      error: error.message,
      errorCode: error.code,
      errorType: error.name,
      retryable: error.retryable,
      serviceId: error.serviceId
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      errorType: error.name,
      stack: error.stack
    };
  }
  return { error: String(error) };
}
