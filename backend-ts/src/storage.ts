/**
 * JSON-file mirror of the response cache, one `<cacheKey>.json` per entry.
 *
 * Durability is best effort: a missing, unreadable, corrupt or expired file is a miss,
 * and a failed write only costs the next process a cache hit.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import type { GenerateResponse } from '@ollama-relay/shared';
import type { CacheEntry } from './cache.js';
import { isCacheKey, type CacheKey } from './cache-key.js';
import { logger } from './logger.js';
import { StoredCacheEntrySchema } from './schemas.js';

export type StoredEntry = CacheEntry<GenerateResponse>;

export class FileCacheStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  /**
   * Load an entry from disk, or null if there is no usable one.
   */
  async load(key: CacheKey): Promise<StoredEntry | null> {
    if (!isCacheKey(key)) {
      return null;
    }

    const path = this.getEntryPath(key);
    let raw: string;
    try {
      raw = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      logger.warn(`Removing unreadable cache file ${path}: ${error}`);
      await this.discard(key);
      return null;
    }

    const entry = this.parse(raw, key);
    if (entry === null) {
      logger.warn(`Removing corrupt cache file ${path}`);
      await this.discard(key);
      return null;
    }

    if (Date.now() > entry.expiresAt) {
      logger.debug(`Removing expired cache file ${path}`);
      await this.discard(key);
      return null;
    }

    return entry;
  }

  /**
   * Write an entry. Failures are logged, not thrown.
   */
  async save(entry: StoredEntry): Promise<boolean> {
    const path = this.getEntryPath(entry.key);
    try {
      await this.ensureDirectory();
      await fs.writeFile(path, JSON.stringify(entry, null, 2), 'utf-8');
      return true;
    } catch (error) {
      logger.warn(`Could not persist cache entry ${entry.key}: ${error}`);
      return false;
    }
  }

  /**
   * Delete the entry at `key`. Anything else sitting at that path goes too.
   */
  async remove(key: CacheKey): Promise<void> {
    if (!isCacheKey(key)) {
      return;
    }
    await fs.rm(this.getEntryPath(key), { force: true, recursive: true });
  }

  /**
   * Remove without failing the lookup that found the file unusable.
   */
  private async discard(key: CacheKey): Promise<void> {
    try {
      await this.remove(key);
    } catch (error) {
      logger.warn(`Could not remove cache file for ${key}: ${error}`);
    }
  }

  /**
   * Read every cache file. Corrupt and expired files are deleted on the way.
   */
  async scan(): Promise<{ entries: StoredEntry[]; removed: number }> {
    const keys = await this.listKeys();
    const loaded = await Promise.all(keys.map((key) => this.load(key)));
    const entries = loaded.filter((entry): entry is StoredEntry => entry !== null);
    return { entries, removed: keys.length - entries.length };
  }

  /**
   * Delete every cache file in the directory. Other files are left alone.
   *
   * @returns Number of files removed
   */
  async clear(): Promise<number> {
    const keys = await this.listKeys();
    await Promise.all(keys.map((key) => this.remove(key)));
    logger.info(`Removed ${keys.length} cache files from ${this.directory}`);
    return keys.length;
  }

  private async listKeys(): Promise<CacheKey[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return files
      .filter((filename) => filename.endsWith('.json'))
      .map((filename) => filename.slice(0, -'.json'.length))
      .filter(isCacheKey);
  }

  private parse(raw: string, key: CacheKey): StoredEntry | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const result = StoredCacheEntrySchema.safeParse(json);
    if (!result.success || result.data.key !== key) {
      return null;
    }
    return result.data;
  }

  private async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
  }

  private getEntryPath(key: CacheKey): string {
    return join(this.directory, `${key}.json`);
  }
}
