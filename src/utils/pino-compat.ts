/**
 * Compatibility layer for Pino logger integration
 *
 * Adapts a Pino instance to our Logger interface.
 */

import type { LoggingConfig } from '../schemas/configSchema';
import type { Logger, LogData } from './logging';
import { createPinoInstance, prepareLogData } from './pino-core';

/**
 * Create a logger instance using Pino that's compatible with our Logger interface
 *
 * @param config The logging configuration
 * @param context Optional context name for the logger
 */
export function createCompatiblePinoLogger(
  config: Partial<LoggingConfig>,
  context?: string
): Logger {
  const pinoLogger = createPinoInstance(config, context);

  function debug(message: string, data?: LogData): void {
    pinoLogger.debug(prepareLogData(data), message);
  }

  function info(message: string, data?: LogData): void {
    pinoLogger.info(prepareLogData(data), message);
  }

  function warn(message: string, data?: LogData): void {
    pinoLogger.warn(prepareLogData(data), message);
  }

  function error(message: string, data?: LogData): void {
    pinoLogger.error(prepareLogData(data), message);
  }

  /**
   * Log a breadcrumb entry for tracking the execution path of a request
   *
   * @param step The description of the execution step
   * @param duration Optional duration in milliseconds
   * @param data Optional additional data
   */
  function breadcrumb(step: string, duration?: number, data?: LogData): void {
    const breadcrumbData = {
      type: 'breadcrumb',
      ...prepareLogData(data),
      ...(duration !== undefined ? { durationMs: duration } : {})
    };

    pinoLogger.debug(breadcrumbData, `BREADCRUMB: ${step}`);
  }

  return {
    debug,
    info,
    warn,
    error,
    breadcrumb
  };
}
