/**
 * Newsbrief — TTL Disk Cache
 *
 * One JSON file per key under the cache directory, named by the MD5 digest
 * of the key and holding `{ timestamp, content }`. Freshness is decided on
 * read: `get` ignores entries at or past the caller's max age, and nothing
 * is deleted unless `prune` is run.
 *
 * Caching is best-effort. Read problems (missing file, corrupt JSON, content
 * that fails the schema) are cache misses; write problems are logged and
 * swallowed.
 */

import { createHash } from 'crypto';
import { mkdir, readdir, readFile, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { CacheStats } from '../types';
import { systemClock, type Clock } from '../lib/clock';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'cache' });

const MS_PER_MINUTE = 60_000;

const CacheFileSchema = z.object({
  timestamp: z.string(),
  content: z.unknown(),
});

export interface TtlCacheOptions {
  clock?: Clock;
}

export class TtlCache<T> {
  private readonly clock: Clock;

  /**
   * @param directory - created on first write if missing
   * @param schema - validates stored content on every read
   */
  constructor(
    readonly directory: string,
    private readonly schema: z.ZodType<T>,
    options: TtlCacheOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Return the value stored for `key` if it was written less than
   * `maxAgeMinutes` ago, otherwise undefined. Never throws.
   */
  async get(key: string, maxAgeMinutes: number): Promise<T | undefined> {
    const entry = await this.readEntry(this.pathFor(key));
    if (!entry) return undefined;

    const ageMs = this.clock.now() - entry.writtenAt;
    if (ageMs >= maxAgeMinutes * MS_PER_MINUTE) {
      log.debug('Cache entry expired', { key: key.slice(0, 20), ageMs });
      return undefined;
    }

    const content = this.schema.safeParse(entry.content);
    if (!content.success) {
      log.warn('Cache entry failed validation', { key: key.slice(0, 20) });
      return undefined;
    }

    log.debug('Cache hit', { key: key.slice(0, 20) });
    return content.data;
  }

  /**
   * Overwrite the entry for `key`, stamped with the current time.
   */
  async set(key: string, content: T): Promise<void> {
    const file = {
      timestamp: new Date(this.clock.now()).toISOString(),
      content,
    };

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.pathFor(key), JSON.stringify(file, null, 2), 'utf-8');
    } catch (error) {
      log.warn('Cache write failed', { key: key.slice(0, 20), error: errorMessage(error) });
    }
  }

  /**
   * Delete entries older than `maxAgeMinutes`, and entries that cannot be
   * read. Returns how many files were removed.
   */
  async prune(maxAgeMinutes: number): Promise<number> {
    let removed = 0;

    for (const path of await this.entryPaths()) {
      const entry = await this.readEntry(path);
      const expired = !entry || this.clock.now() - entry.writtenAt >= maxAgeMinutes * MS_PER_MINUTE;
      if (!expired) continue;

      try {
        await unlink(path);
        removed++;
      } catch (error) {
        log.warn('Cache prune failed for entry', { path, error: errorMessage(error) });
      }
    }

    log.info('Cache pruned', { removed, maxAgeMinutes });
    return removed;
  }

  async stats(): Promise<CacheStats> {
    let entries = 0;
    let bytes = 0;

    for (const path of await this.entryPaths()) {
      try {
        bytes += (await stat(path)).size;
        entries++;
      } catch (error) {
        log.debug('Cache entry vanished during stats', { path, error: errorMessage(error) });
      }
    }

    return { directory: this.directory, entries, bytes };
  }

  /**
   * Storage address for a key: 32 hex chars of MD5.
   */
  static hashKey(key: string): string {
    return createHash('md5').update(key, 'utf-8').digest('hex');
  }

  private pathFor(key: string): string {
    return join(this.directory, `${TtlCache.hashKey(key)}.json`);
  }

  private async entryPaths(): Promise<string[]> {
    try {
      const names = await readdir(this.directory);
      return names.filter(name => name.endsWith('.json')).map(name => join(this.directory, name));
    } catch (error) {
      log.debug('Cache directory not readable', { directory: this.directory, error: errorMessage(error) });
      return [];
    }
  }

  private async readEntry(path: string): Promise<{ writtenAt: number; content: unknown } | undefined> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch {
      return undefined;
    }

    try {
      const parsed = CacheFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return undefined;

      const writtenAt = Date.parse(parsed.data.timestamp);
      if (Number.isNaN(writtenAt)) return undefined;

      return { writtenAt, content: parsed.data.content };
    } catch (error) {
      log.warn('Cache read error', { path, error: errorMessage(error) });
      return undefined;
    }
  }
}
