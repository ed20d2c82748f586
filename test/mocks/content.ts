/**
 * In-process collaborators for cache tests: a text codec, a text transform
 * and byte fetchers that never touch the network
 */

import { vi } from 'vitest';
import { NetworkError } from '../../src/errors/baseErrors';
import type { ContentCodec, ContentTransform } from '../../src/cache/types';

/**
 * Text content. Bytes starting with '!' count as corrupt.
 */
export const textCodec: ContentCodec<string> = {
  decode: bytes => {
    const text = Buffer.from(bytes).toString('utf8');
    return text.startsWith('!') ? null : text;
  },
  encode: content => Buffer.from(content, 'utf8')
};

export function createTextTransform() {
  return vi.fn<ContentTransform<string>>((content, transform) =>
    `${content}@${transform.kind}:${transform.size.width}x${transform.size.height}`
  );
}

/**
 * Answers from a fixed table; unknown locators fail like a 404
 */
export function createFakeFetcher(responses: Record<string, string>) {
  return vi.fn(async (locator: string, _signal: AbortSignal): Promise<Uint8Array> => {
    const body = responses[locator];
    if (body === undefined) {
      throw new NetworkError('Unexpected response status 404', { retryable: false });
    }
    return Buffer.from(body, 'utf8');
  });
}

export interface PendingFetch {
  locator: string;
  signal: AbortSignal;
  resolve: (body: string) => void;
  reject: (error: Error) => void;
}

/**
 * Fetches stay pending until the test settles them. Aborting rejects.
 */
export function createDeferredFetcher() {
  const pending: PendingFetch[] = [];
  const fetchBytes = vi.fn((locator: string, signal: AbortSignal) =>
    new Promise<Uint8Array>((resolve, reject) => {
      pending.push({
        locator,
        signal,
        resolve: body => resolve(Buffer.from(body, 'utf8')),
        reject
      });
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    })
  );
  return { fetchBytes, pending };
}
