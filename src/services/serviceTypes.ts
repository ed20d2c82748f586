/**
 * Service type identifiers for dependency injection
 */

import type { ArtifactPaths } from '../cache/artifactPaths';
import type { CacheOrchestrator } from '../cache/cacheOrchestrator';
import type { DiskStore } from '../cache/diskStore';
import type { Downloader } from '../cache/downloader';
import type { MemoryCache } from '../cache/memoryCache';
import type { Transformer } from '../cache/transformer';
import type { ByteFetcher, ContentCodec, ContentTransform, UniqueName } from '../cache/types';
import type { ContentCacheConfig } from '../schemas/configSchema';
import type { CallbackQueue } from '../utils/callbackQueue';
import type { Logger } from '../utils/logging';
import { serviceToken } from './dependencyInjectionContainer';
import type { LifecycleSignals } from './lifecycleSignals';

export type LoggerFactory = (context: string) => Logger;

/**
 * Services that do not depend on the content type
 */
export const ServiceTypes = {
  CONFIG: serviceToken<ContentCacheConfig>('Config'),
  LOGGER_FACTORY: serviceToken<LoggerFactory>('LoggerFactory'),
  CALLBACK_QUEUE: serviceToken<CallbackQueue>('CallbackQueue'),
  LIFECYCLE_SIGNALS: serviceToken<LifecycleSignals>('LifecycleSignals'),
  UNIQUE_NAME: serviceToken<UniqueName>('UniqueName'),
  DISK_STORE: serviceToken<DiskStore>('DiskStore'),
  ARTIFACT_PATHS: serviceToken<ArtifactPaths>('ArtifactPaths'),
  BYTE_FETCHER: serviceToken<ByteFetcher>('ByteFetcher')
} as const;

/**
 * Services typed by the content they hold. One container serves one content type.
 */
export function contentServiceTypes<Content>() {
  return {
    CODEC: serviceToken<ContentCodec<Content>>('ContentCodec'),
    CONTENT_TRANSFORM: serviceToken<ContentTransform<Content> | undefined>('ContentTransform'),
    MEMORY_CACHE: serviceToken<MemoryCache<Content>>('MemoryCache'),
    DOWNLOADER: serviceToken<Downloader<Content>>('Downloader'),
    TRANSFORMER: serviceToken<Transformer<Content>>('Transformer'),
    ORCHESTRATOR: serviceToken<CacheOrchestrator<Content>>('CacheOrchestrator')
  } as const;
}
