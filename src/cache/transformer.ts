/**
 * Transform stage
 *
 * Turns a download result into the content for one cache key and persists
 * the derived artifact. Runs once per key under the format registry.
 */

import { errorDetails } from '../errors/baseErrors';
import { DecodeError, TransformError } from '../errors/contentErrors';
import { silentLogger, type Logger } from '../utils/logging';
import type { CacheKey, TransformDescriptor } from './cacheKey';
import type { ArtifactPaths } from './artifactPaths';
import type { DiskStore } from './diskStore';
import type { ContentCodec, ContentTransform, DownloadResult } from './types';

export interface TransformerDependencies<Content> {
  store: DiskStore;
  paths: ArtifactPaths;
  codec: ContentCodec<Content>;
  /** Implements `scaled` and `round`. Without one those transforms yield null. */
  transformContent?: ContentTransform<Content>;
  logger?: Logger;
}

export class Transformer<Content> {
  private readonly store: DiskStore;
  private readonly paths: ArtifactPaths;
  private readonly codec: ContentCodec<Content>;
  private readonly transformContent?: ContentTransform<Content>;
  private readonly logger: Logger;

  constructor(dependencies: TransformerDependencies<Content>) {
    this.store = dependencies.store;
    this.paths = dependencies.paths;
    this.codec = dependencies.codec;
    this.transformContent = dependencies.transformContent;
    this.logger = dependencies.logger ?? silentLogger;
  }

  async transform(
    key: CacheKey<Content>,
    download: DownloadResult<Content>,
    signal: AbortSignal
  ): Promise<Content | null> {
    const isOriginal = key.transform.kind === 'original';
    const path = this.paths.pathFor(key);

    // The original artifact is the download itself
    if (!isOriginal) {
      const stored = await this.readDerived(path);
      if (stored !== null) {
        this.logger.debug('Using stored derived artifact', { locator: key.locator, path });
        return stored;
      }
    }

    const content = this.materialize(key, download);
    if (content === null || signal.aborted) return null;

    const startTime = Date.now();
    let result: Content | null;
    try {
      result = await this.apply(key.transform, content);
    } catch (error) {
      const transformError = new TransformError('Transform failed', { locator: key.locator }, error);
      this.logger.warn(transformError.message, {
        locator: key.locator,
        transform: key.transform.kind,
        cause: error instanceof Error ? error.message : String(error),
        ...errorDetails(transformError)
      });
      return null;
    }

    if (result === null) {
      const transformError = new TransformError('Transform produced no content', { locator: key.locator });
      this.logger.warn(transformError.message, {
        locator: key.locator,
        transform: key.transform.kind,
        ...errorDetails(transformError)
      });
      return null;
    }

    if (!isOriginal) {
      this.logger.breadcrumb('Applied transform', Date.now() - startTime, {
        locator: key.locator,
        transform: key.transform.kind
      });
      await this.persist(path, result);
    }

    return result;
  }

  private async readDerived(path: string): Promise<Content | null> {
    const bytes = await this.store.read(path);
    return bytes === null ? null : this.codec.decode(bytes);
  }

  private materialize(key: CacheKey<Content>, download: DownloadResult<Content>): Content | null {
    if (download.kind === 'previous') {
      return download.content;
    }
    const content = this.codec.decode(download.bytes);
    if (content === null) {
      const decodeError = new DecodeError('Downloaded bytes could not be decoded', {
        locator: key.locator,
        size: download.bytes.byteLength
      });
      this.logger.warn(decodeError.message, { locator: key.locator, ...errorDetails(decodeError) });
    }
    return content;
  }

  private async apply(transform: TransformDescriptor<Content>, content: Content): Promise<Content | null> {
    switch (transform.kind) {
      case 'original':
        return content;
      case 'custom':
        return transform.apply(content);
      case 'scaled':
      case 'round':
        if (!this.transformContent) {
          throw new TransformError(`No content transform configured for '${transform.kind}'`);
        }
        return this.transformContent(content, transform);
    }
  }

  private async persist(path: string, content: Content): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = this.codec.encode(content);
    } catch (error) {
      this.logger.warn('Failed to encode derived artifact', { path, ...errorDetails(error) });
      return;
    }
    await this.store.write(path, bytes);
  }
}
