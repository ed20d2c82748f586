/**
 * Core Pino logger implementation
 *
 * This module provides the base Pino logger setup with configuration mappings
 * from our logging options to Pino options.
 */

import pino, { type Logger as PinoLogger } from 'pino';
import type { LoggingConfig } from '../schemas/configSchema';
import type { LogData } from './logging';

// Map our log levels to Pino levels
const LOG_LEVEL_MAP: Record<string, string> = {
  'DEBUG': 'debug',
  'INFO': 'info',
  'WARN': 'warn',
  'ERROR': 'error'
};

// Fields that should be redacted for security/privacy
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'apiKey',
  'credentials'
];

/**
 * Creates a properly configured Pino logger instance
 *
 * @param config The logging configuration
 * @param context Optional context name for the logger
 */
export function createPinoInstance(
  config: Partial<LoggingConfig>,
  context?: string
): PinoLogger {
  const pinoLevel = LOG_LEVEL_MAP[config.level || 'INFO'] || 'info';

  const pinoOptions: pino.LoggerOptions = {
    level: pinoLevel,
    timestamp: config.includeTimestamp !== false,
    messageKey: 'message',
    base: context ? { context } : {},
    redact: {
      paths: SENSITIVE_FIELDS,
      censor: '[REDACTED]'
    }
  };

  if (config.prettyPrint === true) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: config.colorize === true,
        translateTime: true,
        ignore: 'pid,hostname',
        messageKey: 'message',
        messageFormat: '{if context}[{context}] {end}{message}'
      }
    };
  }

  return pino(pinoOptions);
}

/**
 * Convert our LogData to Pino format, dropping fields that are undefined
 */
export function prepareLogData(data?: LogData): Record<string, unknown> {
  if (!data) return {};
  return Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined));
}
