/**
 * Disk tier
 *
 * One flat directory of artifacts. Writes go to a hidden temporary file in
 * the same directory and are then renamed into place, so readers only ever
 * see complete files. Hidden files are invisible to listing and trimming.
 */

import { mkdir, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { silentLogger, type Logger } from '../utils/logging';
import { errorDetails, ValidationError } from '../errors/baseErrors';
import { CacheReadError, CacheWriteError, DiskTrimError } from '../errors/cacheErrors';

export interface DiskEntry {
  name: string;
  path: string;
  size: number;
  modifiedMs: number;
}

export interface TrimResult {
  deleted: string[];
  bytesBefore: number;
  bytesAfter: number;
}

/**
 * Whether `value` can serve as a disk budget in bytes
 */
export function isByteLimit(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DiskStore {
  readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger: Logger = silentLogger) {
    this.directory = directory;
    this.logger = logger;
  }

  pathFor(fileName: string): string {
    return join(this.directory, fileName);
  }

  async ensureDirectory(): Promise<boolean> {
    try {
      await mkdir(this.directory, { recursive: true });
      return true;
    } catch (error) {
      this.logger.warn('Failed to create cache directory', {
        directory: this.directory,
        ...errorDetails(error)
      });
      return false;
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      const stats = await stat(path);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Read a whole artifact. Absence and read failures both return null.
   */
  async read(path: string): Promise<Buffer | null> {
    try {
      return await readFile(path);
    } catch (error) {
      if (!isMissingFileError(error)) {
        const readError = new CacheReadError('Failed to read artifact', { path }, error);
        this.logger.debug(readError.message, { path, ...errorDetails(readError) });
      }
      return null;
    }
  }

  /**
   * Atomically replace the artifact at `path`
   *
   * @returns false when the artifact could not be persisted
   */
  async write(path: string, bytes: Uint8Array): Promise<boolean> {
    const tempPath = this.pathFor(`.${uuidv4()}.tmp`);
    try {
      await writeFile(tempPath, bytes);
      await rename(tempPath, path);
      return true;
    } catch (error) {
      const writeError = new CacheWriteError('Failed to write artifact', { path }, error);
      this.logger.warn(writeError.message, {
        path,
        cause: error instanceof Error ? error.message : String(error),
        ...errorDetails(writeError)
      });
      await rm(tempPath, { force: true }).catch(() => undefined);
      return false;
    }
  }

  async remove(path: string): Promise<boolean> {
    try {
      await unlink(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Visible regular files with their sizes and modification times, in listing order
   */
  async listEntries(): Promise<DiskEntry[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      this.logger.debug('Failed to list cache directory', {
        directory: this.directory,
        ...errorDetails(error)
      });
      return [];
    }

    const entries: DiskEntry[] = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;
      const path = this.pathFor(name);
      try {
        const stats = await stat(path);
        if (!stats.isFile()) continue;
        entries.push({ name, path, size: stats.size, modifiedMs: stats.mtimeMs });
      } catch {
        // Removed between listing and stat
        continue;
      }
    }
    return entries;
  }

  async totalBytes(): Promise<number> {
    const entries = await this.listEntries();
    return entries.reduce((total, entry) => total + entry.size, 0);
  }

  /**
   * Delete the least recently modified files until the directory fits in `byteLimit`
   *
   * @throws ValidationError when `byteLimit` is not a non-negative integer
   */
  async trim(byteLimit: number): Promise<TrimResult> {
    if (!isByteLimit(byteLimit)) {
      throw new ValidationError('Byte limit must be a non-negative integer', { byteLimit });
    }
    const startTime = Date.now();
    const entries = await this.listEntries();
    const bytesBefore = entries.reduce((total, entry) => total + entry.size, 0);
    const deleted: string[] = [];

    if (bytesBefore <= byteLimit) {
      return { deleted, bytesBefore, bytesAfter: bytesBefore };
    }

    // Array.prototype.sort is stable, so equal times keep listing order
    const oldestFirst = [...entries].sort((a, b) => a.modifiedMs - b.modifiedMs);

    let total = bytesBefore;
    for (const entry of oldestFirst) {
      if (total <= byteLimit) break;
      total -= entry.size;
      try {
        await unlink(entry.path);
        deleted.push(entry.name);
      } catch (error) {
        const trimError = new DiskTrimError('Failed to delete file during trim', { path: entry.path }, error);
        this.logger.debug(trimError.message, { path: entry.path, ...errorDetails(trimError) });
      }
    }

    this.logger.info('Trimmed disk cache', {
      directory: this.directory,
      byteLimit,
      bytesBefore,
      bytesAfter: total,
      deletedCount: deleted.length,
      durationMs: Date.now() - startTime
    });

    return { deleted, bytesBefore, bytesAfter: total };
  }

  /**
   * Remove and recreate the directory
   */
  async removeAll(): Promise<void> {
    try {
      await rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Failed to remove cache directory', {
        directory: this.directory,
        ...errorDetails(error)
      });
    }
    await this.ensureDirectory();
  }
}
