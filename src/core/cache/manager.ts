/**
 * CacheManager - persistent extraction cache with checksum-based invalidation.
 * Cache location: <cache_directory>/references.json
 */
import * as path from 'node:path';
import { z } from 'zod';
import { readFile, writeFile, fileExists } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { ReferenceCacheFile, CachedFileResult, CacheStats } from './types.js';
import { CACHE_VERSION, CACHE_FILE } from './types.js';

const LocationSchema = z.object({ begin: z.number(), end: z.number() });

const CachedFileResultSchema = z.object({
  checksum: z.string(),
  cachedAt: z.string(),
  references: z.array(
    z.object({
      name: z.string(),
      moduleNesting: z.array(z.string()),
      location: z.object({
        startRow: z.number(),
        startCol: z.number(),
        endRow: z.number(),
        endCol: z.number(),
      }),
    })
  ),
  definitions: z.array(
    z.object({
      fullyQualifiedName: z.string(),
      location: LocationSchema,
    })
  ),
});

const ReferenceCacheFileSchema = z.object({
  version: z.string(),
  configChecksum: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  files: z.record(z.string(), CachedFileResultSchema),
});

/**
 * Manages the persistent extraction cache.
 * Entries are keyed by project-relative path and checked against the
 * checksum of the file's current content.
 */
export class CacheManager {
  private readonly cachePath: string;
  private readonly configChecksum: string;
  private cache: ReferenceCacheFile | null = null;
  private stats: CacheStats = {
    hits: 0,
    misses: 0,
    invalidated: 0,
    totalCached: 0,
    fullInvalidation: false,
  };

  constructor(cacheDirectory: string, configChecksum: string) {
    this.cachePath = path.join(cacheDirectory, CACHE_FILE);
    this.configChecksum = configChecksum;
  }

  /**
   * Load cache from disk.
   * Invalidates the entire cache if the format version or the config changed.
   */
  async load(): Promise<void> {
    if (!(await fileExists(this.cachePath))) {
      this.cache = this.createEmptyCache();
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.cachePath));
    } catch (error) {
      logger.debug(`Ignoring unreadable cache at ${this.cachePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      this.cache = this.createEmptyCache();
      return;
    }

    const result = ReferenceCacheFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.debug(`Ignoring malformed cache at ${this.cachePath}`);
      this.cache = this.createEmptyCache();
      return;
    }

    const loaded = result.data;
    if (loaded.version !== CACHE_VERSION || loaded.configChecksum !== this.configChecksum) {
      this.cache = this.createEmptyCache();
      this.stats.fullInvalidation = true;
      return;
    }

    this.cache = loaded;
    this.stats.totalCached = Object.keys(loaded.files).length;
  }

  /**
   * Cached result for a file whose content still has `currentChecksum`,
   * or null on a miss.
   */
  lookup(relativePath: string, currentChecksum: string): CachedFileResult | null {
    if (!this.cache) return null;

    const cached = this.cache.files[relativePath];
    if (!cached) {
      this.stats.misses++;
      return null;
    }

    if (cached.checksum !== currentChecksum) {
      this.stats.invalidated++;
      return null;
    }

    this.stats.hits++;
    return cached;
  }

  set(relativePath: string, result: CachedFileResult): void {
    if (!this.cache) return;
    this.cache.files[relativePath] = result;
    this.cache.updatedAt = new Date().toISOString();
  }

  /**
   * Remove entries for files that are no longer analyzed.
   * @returns Number of entries pruned
   */
  prune(existingFiles: ReadonlySet<string>): number {
    if (!this.cache) return 0;

    let pruned = 0;
    for (const filePath of Object.keys(this.cache.files)) {
      if (!existingFiles.has(filePath)) {
        delete this.cache.files[filePath];
        pruned++;
      }
    }
    return pruned;
  }

  async save(): Promise<void> {
    if (!this.cache) return;
    await writeFile(this.cachePath, JSON.stringify(this.cache));
  }

  getStats(): CacheStats {
    return {
      ...this.stats,
      totalCached: Object.keys(this.cache?.files ?? {}).length,
    };
  }

  clear(): void {
    this.cache = this.createEmptyCache();
  }

  private createEmptyCache(): ReferenceCacheFile {
    const now = new Date().toISOString();
    return {
      version: CACHE_VERSION,
      configChecksum: this.configChecksum,
      createdAt: now,
      updatedAt: now,
      files: {},
    };
  }
}
