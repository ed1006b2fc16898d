/**
 * File scanner - fans the analyzed files out to the extractor and gathers
 * the per-file results once every file is done.
 *
 * Each file is read and extracted independently; nothing is shared between
 * files except the cache, which is only touched synchronously. The order of
 * the gathered results is not part of the contract.
 */
import * as path from 'node:path';
import os from 'node:os';
import { ReferenceExtractor } from '../../parser/extractor.js';
import type { Reference } from '../../parser/types.js';
import { computeChecksum } from '../../utils/checksum.js';
import { ScanError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { globFiles, readFile, toRelative } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { FileReferences, ScanOptions, ScanResult } from './types.js';

/** Default concurrency for parallel file operations */
const DEFAULT_CONCURRENCY = Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 4), 32);

/** Files scanned by {@link getReferences} */
export const DEFAULT_SCAN_PATTERN = 'packs/**/*.rb';

/**
 * Process items in fixed-size batches, collecting results in input order.
 */
async function processInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  processor: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    results.push(...(await Promise.all(batch.map(processor))));
  }
  return results;
}

/**
 * Extract references from every file in `files`.
 *
 * @throws ScanError if any file cannot be read; the whole scan is abandoned
 */
export async function scanFiles(
  files: readonly string[],
  options: ScanOptions
): Promise<ScanResult> {
  const startTime = performance.now();
  const extractor = options.extractor ?? new ReferenceExtractor();
  const cache = options.cache;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  let cacheHits = 0;

  const processFile = async (file: string): Promise<FileReferences> => {
    const relativePath = toRelative(options.projectRoot, file);
    if (options.printFiles) {
      logger.info(`Started processing ${relativePath}`);
    }

    const supplied = options.contents?.get(file);
    let contents: string;
    if (supplied !== undefined) {
      contents = supplied;
    } else {
      try {
        contents = await readFile(file);
      } catch (error) {
        throw new ScanError(
          ErrorCodes.UNREADABLE_FILE,
          `Failed to read contents of ${file}`,
          { file, error: errorMessage(error) }
        );
      }
    }

    // Supplied contents never touch the cache
    const fileCache = supplied === undefined ? cache : undefined;
    const checksum = fileCache ? computeChecksum(contents) : '';
    const cached = fileCache?.lookup(relativePath, checksum);
    let result: FileReferences;
    if (cached) {
      cacheHits++;
      result = {
        file,
        relativePath,
        references: cached.references,
        definitions: cached.definitions,
      };
    } else {
      const extracted = extractor.extract(contents);
      fileCache?.set(relativePath, {
        checksum,
        cachedAt: new Date().toISOString(),
        references: extracted.references,
        definitions: extracted.definitions,
      });
      result = { file, relativePath, ...extracted };
    }

    if (options.printFiles) {
      logger.info(`Finished processing ${relativePath}`);
    }
    return result;
  };

  const results = await processInBatches(files, concurrency, processFile);
  const durationMs = performance.now() - startTime;
  logger.debug(`Scanned ${files.length} file(s) in ${durationMs.toFixed(0)}ms (${cacheHits} from cache)`);

  return { files: results, cacheHits, durationMs };
}

/**
 * Every reference in the Ruby files under `packs/`, without the file it
 * came from. Order is unspecified.
 */
export async function getReferences(projectRoot: string): Promise<Reference[]> {
  const root = path.resolve(projectRoot);
  const files = await globFiles(DEFAULT_SCAN_PATTERN, { cwd: root, absolute: true });
  const { files: results } = await scanFiles(files, { projectRoot: root });
  return results.flatMap((result) => result.references);
}
