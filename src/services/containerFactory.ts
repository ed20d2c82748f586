/**
 * Service Container Factory
 *
 * Wires the cache components into a dependency injection container. Every
 * component is built lazily on first resolution and receives a logger named
 * after it.
 */

import { ArtifactPaths, defaultUniqueName } from '../cache/artifactPaths';
import { createFetchByteFetcher } from '../cache/byteFetcher';
import { CacheOrchestrator } from '../cache/cacheOrchestrator';
import { DiskStore } from '../cache/diskStore';
import { Downloader } from '../cache/downloader';
import { MemoryCache } from '../cache/memoryCache';
import { Transformer } from '../cache/transformer';
import type { ByteFetcher, ContentCodec, ContentTransform, UniqueName } from '../cache/types';
import type { ContentCacheConfig } from '../schemas/configSchema';
import { CallbackQueue } from '../utils/callbackQueue';
import { createLogger, type Logger } from '../utils/logging';
import { DefaultDIContainer } from './dependencyInjectionContainer';
import { LifecycleSignals } from './lifecycleSignals';
import { contentServiceTypes, ServiceTypes, type LoggerFactory } from './serviceTypes';

/**
 * Deployment-supplied parts of the cache
 */
export interface ContentCacheCollaborators<Content> {
  codec: ContentCodec<Content>;
  transformContent?: ContentTransform<Content>;
  /** Defaults to a `fetch`-based fetcher configured from `config.network` */
  fetchBytes?: ByteFetcher;
  uniqueName?: UniqueName;
  signals?: LifecycleSignals;
  /** Used for every component instead of per-component Pino loggers */
  logger?: Logger;
  parent?: DefaultDIContainer;
}

/**
 * Create a container with every cache service registered
 *
 * @param config Validated configuration
 * @param collaborators Codec, transform and optional overrides
 */
export function createContainer<Content>(
  config: ContentCacheConfig,
  collaborators: ContentCacheCollaborators<Content>
): DefaultDIContainer {
  const container = new DefaultDIContainer(collaborators.parent);
  const types = contentServiceTypes<Content>();

  const sharedLogger = collaborators.logger;
  const loggerFactory: LoggerFactory = sharedLogger
    ? () => sharedLogger
    : context => createLogger(config.logging, context);

  container.register(ServiceTypes.CONFIG, config);
  container.register(ServiceTypes.LOGGER_FACTORY, loggerFactory);
  container.register(ServiceTypes.UNIQUE_NAME, collaborators.uniqueName ?? defaultUniqueName);
  container.register(types.CODEC, collaborators.codec);
  container.register(types.CONTENT_TRANSFORM, collaborators.transformContent);

  container.registerFactory(ServiceTypes.CALLBACK_QUEUE, c =>
    new CallbackQueue(c.resolve(ServiceTypes.LOGGER_FACTORY)('CallbackQueue'))
  );

  const signals = collaborators.signals;
  if (signals) {
    container.register(ServiceTypes.LIFECYCLE_SIGNALS, signals);
  } else {
    container.registerFactory(ServiceTypes.LIFECYCLE_SIGNALS, () => new LifecycleSignals());
  }

  const fetchBytes = collaborators.fetchBytes;
  if (fetchBytes) {
    container.register(ServiceTypes.BYTE_FETCHER, fetchBytes);
  } else {
    container.registerFactory(
      ServiceTypes.BYTE_FETCHER,
      c => createFetchByteFetcher(config.network, c.resolve(ServiceTypes.LOGGER_FACTORY)('ByteFetcher')),
      { liveOnly: true }
    );
  }

  container.registerFactory(ServiceTypes.DISK_STORE, c =>
    new DiskStore(config.directory, c.resolve(ServiceTypes.LOGGER_FACTORY)('DiskStore'))
  );

  container.registerFactory(ServiceTypes.ARTIFACT_PATHS, c =>
    new ArtifactPaths(c.resolve(ServiceTypes.DISK_STORE), c.resolve(ServiceTypes.UNIQUE_NAME))
  );

  container.registerFactory(types.MEMORY_CACHE, c =>
    new MemoryCache<Content>({
      removeAllOnBackground: config.removeAllFromMemoryOnBackground,
      logger: c.resolve(ServiceTypes.LOGGER_FACTORY)('MemoryCache')
    })
  );

  container.registerFactory(types.DOWNLOADER, c =>
    new Downloader<Content>({
      store: c.resolve(ServiceTypes.DISK_STORE),
      paths: c.resolve(ServiceTypes.ARTIFACT_PATHS),
      codec: c.resolve(types.CODEC),
      fetchBytes: c.resolve(ServiceTypes.BYTE_FETCHER),
      logger: c.resolve(ServiceTypes.LOGGER_FACTORY)('Downloader')
    })
  );

  container.registerFactory(types.TRANSFORMER, c =>
    new Transformer<Content>({
      store: c.resolve(ServiceTypes.DISK_STORE),
      paths: c.resolve(ServiceTypes.ARTIFACT_PATHS),
      codec: c.resolve(types.CODEC),
      transformContent: c.resolve(types.CONTENT_TRANSFORM),
      logger: c.resolve(ServiceTypes.LOGGER_FACTORY)('Transformer')
    })
  );

  container.registerFactory(types.ORCHESTRATOR, c =>
    new CacheOrchestrator<Content>({
      memory: c.resolve(types.MEMORY_CACHE),
      store: c.resolve(ServiceTypes.DISK_STORE),
      paths: c.resolve(ServiceTypes.ARTIFACT_PATHS),
      codec: c.resolve(types.CODEC),
      downloader: c.resolve(types.DOWNLOADER),
      transformer: c.resolve(types.TRANSFORMER),
      callbackQueue: c.resolve(ServiceTypes.CALLBACK_QUEUE),
      signals: c.resolve(ServiceTypes.LIFECYCLE_SIGNALS),
      byteLimit: config.byteLimit,
      logger: c.resolve(ServiceTypes.LOGGER_FACTORY)('CacheOrchestrator')
    })
  );

  return container;
}
