/**
 * In-memory tier
 *
 * Holds fully materialized results keyed by cache key id. Entries are only
 * ever removed all at once: on memory pressure, or on entering the
 * background when `removeAllOnBackground` is set.
 */

import type { CacheKey } from './cacheKey';
import { SignalObserver, type LifecycleSignals } from '../services/lifecycleSignals';
import { silentLogger, type Logger } from '../utils/logging';

export interface MemoryCacheOptions {
  removeAllOnBackground?: boolean;
  logger?: Logger;
}

export class MemoryCache<Content> {
  private readonly items = new Map<string, Content>();
  private observer?: SignalObserver<MemoryCache<Content>>;
  private readonly logger: Logger;
  removeAllOnBackground: boolean;

  constructor(options: MemoryCacheOptions = {}) {
    this.removeAllOnBackground = options.removeAllOnBackground ?? false;
    this.logger = options.logger ?? silentLogger;
  }

  get(key: CacheKey<Content>): Content | undefined {
    return this.items.get(key.id);
  }

  has(key: CacheKey<Content>): boolean {
    return this.items.has(key.id);
  }

  set(key: CacheKey<Content>, value: Content): void {
    this.items.set(key.id, value);
  }

  get size(): number {
    return this.items.size;
  }

  removeAll(): void {
    if (this.items.size === 0) return;
    const count = this.items.size;
    this.items.clear();
    this.logger.debug('Removed all entries from memory', { count });
  }

  /**
   * Start reacting to lifecycle signals. Calling again replaces the previous binding.
   */
  observe(signals: LifecycleSignals): void {
    this.stopObserving();
    const observer = new SignalObserver(signals, this);
    observer.when('memoryPressure', cache => cache.removeAll());
    observer.when('enteredBackground', cache => {
      if (cache.removeAllOnBackground) {
        cache.removeAll();
      }
    });
    this.observer = observer;
  }

  stopObserving(): void {
    this.observer?.removeAll();
    this.observer = undefined;
  }
}
