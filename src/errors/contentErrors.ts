/**
 * Errors raised while producing content: downloading, decoding and transforming
 */

import { ServiceError, type ErrorDetails } from './baseErrors';

/**
 * Error when the original resource could not be downloaded
 */
export class DownloadError extends ServiceError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'Downloader', {
      code: 'DOWNLOAD_ERROR',
      details,
      retryable: true,
      cause
    });
  }
}

/**
 * Error when bytes are present but cannot be decoded into content
 */
export class DecodeError extends ServiceError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'Transformer', {
      code: 'DECODE_ERROR',
      details,
      retryable: false
    });
  }
}

/**
 * Error when a transform fails or yields nothing
 */
export class TransformError extends ServiceError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'Transformer', {
      code: 'TRANSFORM_ERROR',
      details,
      retryable: false,
      cause
    });
  }
}
