/**
 * Configuration Schema for the content cache
 *
 * Zod schemas for validating configuration objects, whether they come from
 * the environment, a JSON file read by the CLI, or code.
 */

import { z } from 'zod';

// ==========================================================================
// Helper schemas for reusable components
// ==========================================================================

/**
 * Schema for retry configuration of the network fetcher
 */
const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(1),
  initialDelayMs: z.number().int().min(0).default(200),
  maxDelayMs: z.number().int().min(0).default(2000),
});

/**
 * Schema for network configuration
 */
const networkConfigSchema = z.object({
  // Per-attempt timeout
  requestTimeoutMs: z.number().int().positive().default(15_000),
  // Overall timeout across all attempts
  resourceTimeoutMs: z.number().int().positive().default(90_000),
  retry: retryConfigSchema.default({}),
});

/**
 * Schema for logging configuration
 */
const loggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  includeTimestamp: z.boolean().default(true),
  prettyPrint: z.boolean().default(false),
  colorize: z.boolean().default(false),
});

// ==========================================================================
// Main configuration schema
// ==========================================================================

export const contentCacheConfigSchema = z.object({
  directory: z.string().min(1),
  // `null` disables trimming entirely
  byteLimit: z.number().int().nonnegative().nullable().default(500_000_000),
  removeAllFromMemoryOnBackground: z.boolean().default(false),
  network: networkConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type ContentCacheConfigInput = z.input<typeof contentCacheConfigSchema>;
export type ContentCacheConfig = z.output<typeof contentCacheConfigSchema>;
export type LoggingConfig = z.output<typeof loggingConfigSchema>;
export type NetworkConfig = z.output<typeof networkConfigSchema>;
