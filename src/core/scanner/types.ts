/**
 * Types for the file scanner.
 */
import type { CacheManager } from '../cache/manager.js';
import type { ReferenceExtractor } from '../../parser/extractor.js';
import type { Definition, Reference } from '../../parser/types.js';

/**
 * Extraction result for one analyzed file.
 */
export interface FileReferences {
  /** Absolute path */
  file: string;
  /** Project-relative path with forward slashes */
  relativePath: string;
  references: Reference[];
  definitions: Definition[];
}

export interface ScanOptions {
  projectRoot: string;
  /** Files processed at once (default: 75% of CPUs, min 4, max 32) */
  concurrency?: number;
  /** Results of unchanged files are taken from here and new ones stored */
  cache?: CacheManager;
  /** Log each file as it starts and finishes */
  printFiles?: boolean;
  /** Absolute path → contents to use instead of reading the file */
  contents?: ReadonlyMap<string, string>;
  /** Defaults to a fresh extractor */
  extractor?: ReferenceExtractor;
}

export interface ScanResult {
  files: FileReferences[];
  /** Number of files whose result came from the cache */
  cacheHits: number;
  durationMs: number;
}
