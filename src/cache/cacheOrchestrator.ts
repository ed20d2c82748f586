/**
 * Cache Orchestrator
 *
 * Public entry point of the cache. A fetch is answered from memory when
 * possible, then from the formatted artifact on disk, and otherwise by a
 * download shared per locator followed by a transform shared per key.
 * Results are always delivered on the callback queue except for memory
 * hits, which are delivered before `fetch` returns.
 */

import { errorDetails, ValidationError } from '../errors/baseErrors';
import { SignalObserver, type LifecycleSignals } from '../services/lifecycleSignals';
import type { CallbackQueue } from '../utils/callbackQueue';
import { silentLogger, type Logger } from '../utils/logging';
import type { ArtifactPaths } from './artifactPaths';
import {
  createCacheKey,
  ORIGINAL,
  originalKeyFor,
  userContentLocator,
  type CacheKey,
  type TransformDescriptor
} from './cacheKey';
import { isByteLimit, type DiskStore, type TrimResult } from './diskStore';
import type { Downloader } from './downloader';
import type { MemoryCache } from './memoryCache';
import { SingleFlightRegistry } from './singleFlightRegistry';
import type { Transformer } from './transformer';
import type {
  CacheDestination,
  CacheStats,
  CallbackMode,
  ContentCodec,
  DownloadResult
} from './types';

export type ResultCallback<Content> = (content: Content | null) => void;

export interface CacheOrchestratorDependencies<Content> {
  memory: MemoryCache<Content>;
  store: DiskStore;
  paths: ArtifactPaths;
  codec: ContentCodec<Content>;
  downloader: Downloader<Content>;
  transformer: Transformer<Content>;
  callbackQueue: CallbackQueue;
  signals: LifecycleSignals;
  byteLimit: number | null;
  logger?: Logger;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * State of one `fetch` call. `cancelStage` always points at the single-flight
 * request currently outstanding for the call, if any.
 */
interface PendingFetch<Content> {
  key: CacheKey<Content>;
  settled: boolean;
  cancelStage?: () => void;
  deliver: ResultCallback<Content>;
}

export class CacheOrchestrator<Content> {
  private readonly memory: MemoryCache<Content>;
  private readonly store: DiskStore;
  private readonly paths: ArtifactPaths;
  private readonly codec: ContentCodec<Content>;
  private readonly downloader: Downloader<Content>;
  private readonly transformer: Transformer<Content>;
  private readonly callbackQueue: CallbackQueue;
  private readonly signals: LifecycleSignals;
  private readonly logger: Logger;

  private readonly downloads: SingleFlightRegistry<string, DownloadResult<Content> | null>;
  private readonly formats: SingleFlightRegistry<CacheKey<Content>, Content | null>;
  private readonly userContentWrites: SingleFlightRegistry<string, boolean>;

  private limit: number | null;
  private observer?: SignalObserver<CacheOrchestrator<Content>>;

  constructor(dependencies: CacheOrchestratorDependencies<Content>) {
    this.memory = dependencies.memory;
    this.store = dependencies.store;
    this.paths = dependencies.paths;
    this.codec = dependencies.codec;
    this.downloader = dependencies.downloader;
    this.transformer = dependencies.transformer;
    this.callbackQueue = dependencies.callbackQueue;
    this.signals = dependencies.signals;
    this.limit = dependencies.byteLimit;
    this.logger = dependencies.logger ?? silentLogger;

    this.downloads = new SingleFlightRegistry<string, DownloadResult<Content> | null>({
      name: 'download',
      callbackQueue: this.callbackQueue,
      failureResult: null,
      logger: this.logger
    });
    this.formats = new SingleFlightRegistry<CacheKey<Content>, Content | null>({
      name: 'format',
      callbackQueue: this.callbackQueue,
      failureResult: null,
      keyOf: key => key.id,
      logger: this.logger
    });
    this.userContentWrites = new SingleFlightRegistry({
      name: 'userContentWrite',
      callbackQueue: this.callbackQueue,
      failureResult: false,
      logger: this.logger
    });
  }

  /**
   * Create the cache directory and start reacting to lifecycle signals
   */
  async initialize(): Promise<void> {
    await this.store.ensureDirectory();
    this.memory.observe(this.signals);

    this.observer?.removeAll();
    const observer = new SignalObserver(this.signals, this);
    observer.when('enteredBackground', cache => cache.trimInBackground());
    this.observer = observer;

    this.logger.info('Content cache initialized', {
      directory: this.store.directory,
      byteLimit: this.limit
    });
  }

  shutdown(): void {
    this.memory.stopObserving();
    this.observer?.removeAll();
    this.observer = undefined;
    this.logger.debug('Content cache stopped observing lifecycle signals');
  }

  /**
   * Look up or produce the content for `locator` with `transform` applied
   *
   * `onResult` is called at most once, with null on failure. It is not called
   * after the returned cancel handle has been invoked.
   */
  fetch(
    locator: string,
    transform: TransformDescriptor<Content>,
    onResult: ResultCallback<Content>
  ): CallbackMode {
    const key = createCacheKey(locator, transform);

    const cached = this.memory.get(key);
    if (cached !== undefined) {
      onResult(cached);
      return { mode: 'sync' };
    }

    const pending: PendingFetch<Content> = {
      key,
      settled: false,
      deliver: result => {
        if (pending.settled) return;
        pending.settled = true;
        pending.cancelStage = undefined;
        onResult(result);
      }
    };

    this.lookUp(pending).catch(error => {
      this.logger.error('Fetch failed', { locator, ...errorDetails(error) });
      this.callbackQueue.dispatch(() => pending.deliver(null));
    });

    return {
      mode: 'async',
      cancel: () => {
        if (pending.settled) return;
        pending.settled = true;
        const cancelStage = pending.cancelStage;
        pending.cancelStage = undefined;
        cancelStage?.();
        this.logger.debug('Fetch cancelled', { locator });
      }
    };
  }

  /**
   * Promise form of {@link fetch}. Aborting `signal` resolves with null.
   */
  fetchAsync(
    locator: string,
    transform: TransformDescriptor<Content> = ORIGINAL,
    options: FetchOptions = {}
  ): Promise<Content | null> {
    const { signal } = options;
    return new Promise(resolve => {
      if (signal?.aborted) {
        resolve(null);
        return;
      }

      const onAbort = () => {
        if (mode.mode === 'async') mode.cancel();
        resolve(null);
      };
      const mode = this.fetch(locator, transform, result => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      });

      if (mode.mode === 'async') {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  /**
   * Seed content under a caller-chosen key, bypassing the network
   *
   * @returns Whether every requested destination holds the content
   */
  addUserProvidedContent(
    content: Content,
    key: string,
    destinations: CacheDestination[] = ['memory', 'disk']
  ): Promise<boolean> {
    const cacheKey = createCacheKey<Content>(userContentLocator(key), ORIGINAL);

    if (destinations.includes('memory')) {
      this.memory.set(cacheKey, content);
    }
    if (!destinations.includes('disk')) {
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      this.userContentWrites.addRequest(
        cacheKey.locator,
        {
          start: async finish => {
            finish(await this.store.write(this.paths.pathFor(cacheKey), this.codec.encode(content)));
          },
          cancel: () => {}
        },
        resolve
      );
    });
  }

  /**
   * {@link fetch} for content seeded with {@link addUserProvidedContent}.
   * Delivers null when nothing was seeded under `key`.
   */
  userProvidedContent(
    key: string,
    transform: TransformDescriptor<Content>,
    onResult: ResultCallback<Content>
  ): CallbackMode {
    return this.fetch(userContentLocator(key), transform, onResult);
  }

  get byteLimit(): number | null {
    return this.limit;
  }

  /**
   * Change the disk budget and trim to it. Null removes the budget.
   *
   * Rejects with a ValidationError, keeping the current budget, when `limit`
   * is not a non-negative integer.
   */
  async setByteLimit(limit: number | null): Promise<TrimResult | null> {
    if (limit !== null && !isByteLimit(limit)) {
      const error = new ValidationError('Byte limit must be a non-negative integer', { byteLimit: limit });
      this.logger.warn(error.message, { byteLimit: limit, ...errorDetails(error) });
      throw error;
    }
    this.limit = limit;
    return this.trimStaleFiles();
  }

  setRemoveAllFromMemoryOnBackground(enabled: boolean): void {
    this.memory.removeAllOnBackground = enabled;
  }

  async trimStaleFiles(): Promise<TrimResult | null> {
    if (this.limit === null) return null;
    return this.store.trim(this.limit);
  }

  removeAllFromMemory(): void {
    this.memory.removeAll();
  }

  async removeAllFromDisk(): Promise<void> {
    await this.store.removeAll();
    this.logger.info('Removed all artifacts from disk', { directory: this.store.directory });
  }

  async stats(): Promise<CacheStats> {
    const entries = await this.store.listEntries();
    return {
      directory: this.store.directory,
      byteLimit: this.limit,
      memoryEntries: this.memory.size,
      diskFiles: entries.length,
      diskBytes: entries.reduce((total, entry) => total + entry.size, 0),
      inFlightDownloads: this.downloads.taskCount,
      inFlightTransforms: this.formats.taskCount
    };
  }

  private trimInBackground(): void {
    this.trimStaleFiles().catch(error => {
      this.logger.warn('Background trim failed', errorDetails(error));
    });
  }

  private async lookUp(pending: PendingFetch<Content>): Promise<void> {
    const { key } = pending;

    let stored: Content | null = null;
    try {
      stored = await this.readFormatted(key);
    } catch (error) {
      this.logger.debug('Disk lookup failed', { locator: key.locator, ...errorDetails(error) });
    }

    if (stored !== null) {
      const content = stored;
      this.memory.set(key, content);
      this.callbackQueue.dispatch(() => pending.deliver(content));
      return;
    }

    if (pending.settled) return;
    this.startDownload(pending);
  }

  private async readFormatted(key: CacheKey<Content>): Promise<Content | null> {
    const bytes = await this.store.read(this.paths.pathFor(key));
    return bytes === null ? null : this.codec.decode(bytes);
  }

  private startDownload(pending: PendingFetch<Content>): void {
    const { key } = pending;
    const controller = new AbortController();

    const requestId = this.downloads.addRequest(
      key.locator,
      {
        start: async finish => {
          const seeded = this.memory.get(originalKeyFor(key));
          if (seeded !== undefined) {
            finish({ kind: 'previous', content: seeded });
            return;
          }
          finish(await this.downloader.download(key.locator, controller.signal));
        },
        cancel: () => controller.abort()
      },
      download => {
        if (download === null) {
          pending.deliver(null);
          return;
        }
        this.startFormat(pending, download);
      }
    );

    pending.cancelStage = () => this.downloads.cancelRequest(requestId);
  }

  private startFormat(pending: PendingFetch<Content>, download: DownloadResult<Content>): void {
    const { key } = pending;
    const controller = new AbortController();

    const requestId = this.formats.addRequest(
      key,
      {
        start: async finish => {
          finish(await this.transformer.transform(key, download, controller.signal));
        },
        cancel: () => controller.abort(),
        onTaskDone: result => {
          if (result !== null) {
            this.memory.set(key, result);
          }
        }
      },
      result => pending.deliver(result)
    );

    pending.cancelStage = () => this.formats.cancelRequest(requestId);
  }
}
