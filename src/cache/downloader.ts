/**
 * Download stage
 *
 * Produces the original artifact for a locator, from disk when a previous
 * download is there and from the network otherwise. Runs once per locator
 * under the download registry, so every transform of one resource shares it.
 */

import { errorDetails } from '../errors/baseErrors';
import { DecodeError, DownloadError } from '../errors/contentErrors';
import { silentLogger, type Logger } from '../utils/logging';
import { isUserContentLocator } from './cacheKey';
import type { ArtifactPaths } from './artifactPaths';
import type { DiskStore } from './diskStore';
import type { ByteFetcher, ContentCodec, DownloadResult } from './types';

export interface DownloaderDependencies<Content> {
  store: DiskStore;
  paths: ArtifactPaths;
  codec: ContentCodec<Content>;
  fetchBytes: ByteFetcher;
  logger?: Logger;
}

export class Downloader<Content> {
  private readonly store: DiskStore;
  private readonly paths: ArtifactPaths;
  private readonly codec: ContentCodec<Content>;
  private readonly fetchBytes: ByteFetcher;
  private readonly logger: Logger;

  constructor(dependencies: DownloaderDependencies<Content>) {
    this.store = dependencies.store;
    this.paths = dependencies.paths;
    this.codec = dependencies.codec;
    this.fetchBytes = dependencies.fetchBytes;
    this.logger = dependencies.logger ?? silentLogger;
  }

  /**
   * @returns null when the resource could not be obtained or `signal` was aborted
   */
  async download(locator: string, signal: AbortSignal): Promise<DownloadResult<Content> | null> {
    const path = this.paths.originalPath(locator);

    const stored = await this.store.read(path);
    if (stored !== null) {
      const content = this.codec.decode(stored);
      if (content !== null) {
        this.logger.debug('Using previously downloaded original', { locator });
        return { kind: 'previous', content };
      }
      const decodeError = new DecodeError('Stored original could not be decoded', { locator, path });
      this.logger.debug(decodeError.message, { locator, ...errorDetails(decodeError) });
    }

    if (isUserContentLocator(locator)) {
      this.logger.debug('No stored content for user-provided key', { locator });
      return null;
    }

    if (signal.aborted) return null;

    const startTime = Date.now();
    let bytes: Uint8Array;
    try {
      bytes = await this.fetchBytes(locator, signal);
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug('Download cancelled', { locator });
        return null;
      }
      const downloadError = new DownloadError('Failed to download resource', { locator }, error);
      this.logger.warn(downloadError.message, {
        locator,
        cause: error instanceof Error ? error.message : String(error),
        ...errorDetails(downloadError)
      });
      return null;
    }

    if (bytes.byteLength === 0) {
      this.logger.warn('Downloaded resource is empty', { locator });
      return null;
    }

    this.logger.breadcrumb('Downloaded resource', Date.now() - startTime, {
      locator,
      size: bytes.byteLength
    });

    await this.store.write(path, bytes);
    return { kind: 'fresh', bytes };
  }
}
