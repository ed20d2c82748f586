/**
 * Network byte fetcher built on the global `fetch`
 */

import { NetworkError, TimeoutError } from '../errors/baseErrors';
import type { NetworkConfig } from '../schemas/configSchema';
import { silentLogger, type Logger } from '../utils/logging';
import { withRetry } from '../utils/retry';
import type { ByteFetcher } from './types';

/**
 * A signal that aborts as soon as any of `signals` does
 */
export function combineSignals(signals: AbortSignal[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort();
      return { signal: controller.signal, dispose: () => {} };
    }
  }
  signals.forEach(signal => signal.addEventListener('abort', abort, { once: true }));

  return {
    signal: controller.signal,
    dispose: () => signals.forEach(signal => signal.removeEventListener('abort', abort))
  };
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function createFetchByteFetcher(
  config: NetworkConfig,
  logger: Logger = silentLogger
): ByteFetcher {
  return async (locator, signal) => {
    const resource = combineSignals([signal, AbortSignal.timeout(config.resourceTimeoutMs)]);

    const attempt = async (): Promise<Uint8Array> => {
      const request = combineSignals([resource.signal, AbortSignal.timeout(config.requestTimeoutMs)]);
      try {
        const response = await fetch(locator, { signal: request.signal });
        if (!response.ok) {
          throw new NetworkError(`Unexpected response status ${response.status}`, {
            retryable: isRetryableStatus(response.status),
            details: { locator, status: response.status }
          });
        }
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        if (error instanceof NetworkError) throw error;
        if (!signal.aborted && request.signal.aborted) {
          throw new TimeoutError('Request timed out', {
            details: {
              locator,
              timeoutMs: resource.signal.aborted ? config.resourceTimeoutMs : config.requestTimeoutMs
            },
            cause: error
          });
        }
        throw new NetworkError('Request failed', {
          // A caller cancellation is final
          retryable: !signal.aborted,
          details: { locator },
          cause: error
        });
      } finally {
        request.dispose();
      }
    };

    try {
      return await withRetry(attempt, {
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        signal: resource.signal,
        logger
      });
    } finally {
      resource.dispose();
    }
  };
}
