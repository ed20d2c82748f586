/**
 * Contracts between the cache engine and the deployment that embeds it
 */

import type { RoundTransform, ScaledTransform } from './cacheKey';

/**
 * Fetches the raw bytes of a resource. Rejects on failure; honours `signal`.
 */
export type ByteFetcher = (locator: string, signal: AbortSignal) => Promise<Uint8Array>;

/**
 * Converts between stored bytes and materialized content
 */
export interface ContentCodec<Content> {
  /** Returns null when the bytes do not hold valid content */
  decode(bytes: Uint8Array): Content | null;
  encode(content: Content): Uint8Array;
}

/**
 * The deployment's implementation of the built-in geometric transforms
 */
export type ContentTransform<Content> = (
  content: Content,
  transform: ScaledTransform | RoundTransform
) => Content | null | Promise<Content | null>;

/**
 * Maps a locator to the file name prefix shared by all of its artifacts
 */
export type UniqueName = (locator: string) => string;

/**
 * Outcome of the download stage
 *
 * `previous` content was already on disk (or in memory) and has been decoded;
 * `fresh` bytes were just fetched and still need decoding.
 */
export type DownloadResult<Content> =
  | { kind: 'previous'; content: Content }
  | { kind: 'fresh'; bytes: Uint8Array };

export type CacheDestination = 'memory' | 'disk';

export type CallbackMode =
  | { mode: 'sync' }
  | { mode: 'async'; cancel: () => void };

export interface CacheStats {
  directory: string;
  byteLimit: number | null;
  memoryEntries: number;
  diskFiles: number;
  diskBytes: number;
  inFlightDownloads: number;
  inFlightTransforms: number;
}
