/**
 * Types for the persistent extraction cache.
 */
import type { Definition, Reference } from '../../parser/types.js';

/**
 * Cached extraction result for a single file.
 */
export interface CachedFileResult {
  /** SHA-256 checksum (first 16 chars) of file content */
  checksum: string;
  /** Timestamp when cached */
  cachedAt: string;
  references: Reference[];
  definitions: Definition[];
}

/**
 * Root cache structure stored in `<cache_directory>/references.json`.
 */
export interface ReferenceCacheFile {
  /** Cache format version */
  version: string;
  /** packwerk.yml checksum - invalidates all if changed */
  configChecksum: string;
  createdAt: string;
  updatedAt: string;
  /** Relative file path to cached result */
  files: Record<string, CachedFileResult>;
}

/**
 * Cache statistics for logging.
 */
export interface CacheStats {
  /** Valid cached results used */
  hits: number;
  /** Files not in cache */
  misses: number;
  /** Files changed since cached */
  invalidated: number;
  totalCached: number;
  /** Whether a version or config change dropped the whole cache */
  fullInvalidation: boolean;
}

export const CACHE_VERSION = '1.0';

export const CACHE_FILE = 'references.json';
