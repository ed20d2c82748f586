/**
 * Downloader tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactPaths } from '../../src/cache/artifactPaths';
import { userContentLocator } from '../../src/cache/cacheKey';
import { DiskStore } from '../../src/cache/diskStore';
import { Downloader } from '../../src/cache/downloader';
import type { ByteFetcher } from '../../src/cache/types';
import { createMockLogger, type MockLogger } from '../mocks/logging';
import { createDeferredFetcher, createFakeFetcher, textCodec } from '../mocks/content';

const LOCATOR = 'https://x/img';

describe('Downloader', () => {
  let directory: string;
  let logger: MockLogger;
  let store: DiskStore;
  let paths: ArtifactPaths;

  function createDownloader(fetchBytes: ByteFetcher, diskStore: DiskStore = store): Downloader<string> {
    return new Downloader({
      store: diskStore,
      paths: new ArtifactPaths(diskStore, () => 'img'),
      codec: textCodec,
      fetchBytes,
      logger
    });
  }

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'downloader-test-'));
    logger = createMockLogger();
    store = new DiskStore(directory, logger);
    paths = new ArtifactPaths(store, () => 'img');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('fetches fresh bytes and stores them as the original artifact', async () => {
    const fetchBytes = createFakeFetcher({ [LOCATOR]: 'pixels' });
    const downloader = createDownloader(fetchBytes);

    const result = await downloader.download(LOCATOR, new AbortController().signal);

    expect(result?.kind).toBe('fresh');
    expect(fetchBytes).toHaveBeenCalledTimes(1);
    expect(fetchBytes.mock.calls[0][0]).toBe(LOCATOR);
    expect(await readFile(join(directory, 'img_original'), 'utf8')).toBe('pixels');
    expect(paths.originalPath(LOCATOR)).toBe(join(directory, 'img_original'));
  });

  it('returns a previous download without touching the network', async () => {
    await writeFile(join(directory, 'img_original'), 'stored');
    const fetchBytes = createFakeFetcher({ [LOCATOR]: 'pixels' });

    const result = await createDownloader(fetchBytes).download(LOCATOR, new AbortController().signal);

    expect(result).toEqual({ kind: 'previous', content: 'stored' });
    expect(fetchBytes).not.toHaveBeenCalled();
  });

  it('downloads again when the stored original cannot be decoded', async () => {
    await writeFile(join(directory, 'img_original'), '!corrupt');
    const fetchBytes = createFakeFetcher({ [LOCATOR]: 'pixels' });

    const result = await createDownloader(fetchBytes).download(LOCATOR, new AbortController().signal);

    expect(result?.kind).toBe('fresh');
    expect(await readFile(join(directory, 'img_original'), 'utf8')).toBe('pixels');
  });

  it('never fetches user-provided content', async () => {
    const fetchBytes = createFakeFetcher({});

    const result = await createDownloader(fetchBytes).download(userContentLocator('avatar'), new AbortController().signal);

    expect(result).toBeNull();
    expect(fetchBytes).not.toHaveBeenCalled();
  });

  it('returns null and logs when the fetch fails', async () => {
    const result = await createDownloader(createFakeFetcher({})).download(LOCATOR, new AbortController().signal);

    expect(result).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to download resource',
      expect.objectContaining({
        locator: LOCATOR,
        cause: 'Unexpected response status 404',
        errorCode: 'DOWNLOAD_ERROR'
      })
    );
  });

  it('treats an empty body as a failure', async () => {
    const result = await createDownloader(createFakeFetcher({ [LOCATOR]: '' }))
      .download(LOCATOR, new AbortController().signal);

    expect(result).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('Downloaded resource is empty', { locator: LOCATOR });
  });

  it('does not start a fetch once aborted', async () => {
    const fetchBytes = createFakeFetcher({ [LOCATOR]: 'pixels' });
    const controller = new AbortController();
    controller.abort();

    expect(await createDownloader(fetchBytes).download(LOCATOR, controller.signal)).toBeNull();
    expect(fetchBytes).not.toHaveBeenCalled();
  });

  it('returns null without a warning when aborted mid-fetch', async () => {
    const { fetchBytes, pending } = createDeferredFetcher();
    const controller = new AbortController();

    const download = createDownloader(fetchBytes).download(LOCATOR, controller.signal);
    await expect.poll(() => pending.length).toBe(1);
    controller.abort();

    expect(await download).toBeNull();
    expect(logger.debug).toHaveBeenCalledWith('Download cancelled', { locator: LOCATOR });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('still returns the bytes when they cannot be written to disk', async () => {
    const missingStore = new DiskStore(join(directory, 'missing'), logger);
    const downloader = createDownloader(createFakeFetcher({ [LOCATOR]: 'pixels' }), missingStore);

    const result = await downloader.download(LOCATOR, new AbortController().signal);

    expect(result?.kind).toBe('fresh');
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to write artifact',
      expect.objectContaining({ errorCode: 'CACHE_WRITE_ERROR' })
    );
  });
});
