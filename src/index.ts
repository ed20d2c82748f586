/*
 * Tiered Content Cache
 *
 * A memory and disk cache that downloads a resource once, transforms it
 * once per transform, and shares both with every concurrent caller.
 */

import { parseConfig } from './config';
import type { CacheOrchestrator } from './cache/cacheOrchestrator';
import { bufferCodec } from './codecs/bufferCodec';
import type { ContentCacheConfigInput } from './schemas/configSchema';
import { createContainer, type ContentCacheCollaborators } from './services/containerFactory';
import { contentServiceTypes } from './services/serviceTypes';

export interface ContentCacheOptions<Content> extends ContentCacheCollaborators<Content> {
  config?: Partial<ContentCacheConfigInput>;
}

/**
 * Build and initialize a cache
 *
 * @throws ConfigurationError when `options.config` is invalid
 */
export async function createContentCache<Content>(
  options: ContentCacheOptions<Content>
): Promise<CacheOrchestrator<Content>> {
  const { config, ...collaborators } = options;
  const container = createContainer(parseConfig(config), collaborators);
  const cache = container.resolve(contentServiceTypes<Content>().ORCHESTRATOR);
  await cache.initialize();
  return cache;
}

/**
 * {@link createContentCache} for raw bytes
 */
export function createBufferCache(
  options: Omit<ContentCacheOptions<Buffer>, 'codec'> = {}
): Promise<CacheOrchestrator<Buffer>> {
  return createContentCache({ ...options, codec: bufferCodec });
}

export {
  createCacheKey,
  cacheKeysEqual,
  custom,
  diskSuffix,
  isUserContentLocator,
  ORIGINAL,
  originalKeyFor,
  round,
  scaled,
  transformId,
  transformsEqual,
  userContentKey,
  userContentLocator
} from './cache/cacheKey';
export type {
  Border,
  CacheKey,
  ContentMode,
  CustomTransform,
  HairlineBorder,
  OriginalTransform,
  RoundTransform,
  ScaledTransform,
  Size,
  TransformDescriptor
} from './cache/cacheKey';
export { ArtifactPaths, defaultUniqueName } from './cache/artifactPaths';
export { combineSignals, createFetchByteFetcher } from './cache/byteFetcher';
export { CacheOrchestrator } from './cache/cacheOrchestrator';
export type { CacheOrchestratorDependencies, FetchOptions, ResultCallback } from './cache/cacheOrchestrator';
export { DiskStore, isByteLimit } from './cache/diskStore';
export type { DiskEntry, TrimResult } from './cache/diskStore';
export { Downloader } from './cache/downloader';
export { MemoryCache } from './cache/memoryCache';
export { SingleFlightRegistry } from './cache/singleFlightRegistry';
export type { Finish, RequestId, TaskHandlers } from './cache/singleFlightRegistry';
export { Transformer } from './cache/transformer';
export type {
  ByteFetcher,
  CacheDestination,
  CacheStats,
  CallbackMode,
  ContentCodec,
  ContentTransform,
  DownloadResult,
  UniqueName
} from './cache/types';
export { bufferCodec } from './codecs/bufferCodec';
export { DEFAULT_DIRECTORY, getConfigFromEnvironment, megabytes, parseByteLimit, parseConfig } from './config';
export type { ContentCacheConfig, ContentCacheConfigInput } from './schemas/configSchema';
export * from './errors/baseErrors';
export * from './errors/cacheErrors';
export * from './errors/contentErrors';
export { DefaultDIContainer, ServiceResolutionError, serviceToken } from './services/dependencyInjectionContainer';
export type { ContainerContext, DIContainer, ServiceToken } from './services/dependencyInjectionContainer';
export { createContainer } from './services/containerFactory';
export type { ContentCacheCollaborators } from './services/containerFactory';
export { contentServiceTypes, ServiceTypes } from './services/serviceTypes';
export { LifecycleSignals, SignalObserver } from './services/lifecycleSignals';
export type { LifecycleSignal } from './services/lifecycleSignals';
export { CallbackQueue } from './utils/callbackQueue';
export { createLogger, silentLogger } from './utils/logging';
export type { Logger } from './utils/logging';
