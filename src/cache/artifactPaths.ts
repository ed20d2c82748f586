/**
 * Artifact naming
 *
 * Every artifact of a locator lives at `<uniqueName(locator)><diskSuffix>`
 * inside the store's directory.
 */

import { createHash } from 'node:crypto';
import { diskSuffix, ORIGINAL, type CacheKey } from './cacheKey';
import type { DiskStore } from './diskStore';
import type { UniqueName } from './types';

export const defaultUniqueName: UniqueName = locator =>
  createHash('sha256').update(locator).digest('hex').slice(0, 32);

export class ArtifactPaths {
  constructor(
    private readonly store: DiskStore,
    private readonly uniqueName: UniqueName = defaultUniqueName
  ) {}

  fileName(key: CacheKey): string {
    return `${this.uniqueName(key.locator)}${diskSuffix(key.transform)}`;
  }

  pathFor(key: CacheKey): string {
    return this.store.pathFor(this.fileName(key));
  }

  originalPath(locator: string): string {
    return this.store.pathFor(`${this.uniqueName(locator)}${diskSuffix(ORIGINAL)}`);
  }
}
