/**
 * Logging utilities for the content cache
 *
 * Centralized logger interface with structured data. The implementation
 * delegates to Pino (see pino-core and pino-compat).
 */

import type { LoggingConfig } from '../schemas/configSchema';
import { createCompatiblePinoLogger } from './pino-compat';

// Type for log data with flexible structure but known types
export type LogData = Record<string, string | number | boolean | null | undefined | string[] | number[] | Record<string, string | number | boolean | null | undefined>>;

/**
 * Logger interface used by every component
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  breadcrumb(step: string, duration?: number, data?: LogData): void;
}

/**
 * Create a logger instance
 *
 * @param config The logging section of the cache configuration
 * @param context Optional context name for the logger (e.g., 'DiskStore', 'Downloader')
 */
export function createLogger(config: Partial<LoggingConfig> = {}, context?: string): Logger {
  return createCompatiblePinoLogger(config, context);
}

/**
 * Logger that discards everything, for embedders that bring no logging config
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  breadcrumb: () => {}
};
