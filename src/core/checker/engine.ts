/**
 * Analysis pipeline shared by `check` and `update`: discover files and
 * packs, scan, resolve and check.
 */
import * as path from 'node:path';
import type { Configuration } from '../config/loader.js';
import { CacheManager } from '../cache/manager.js';
import { listIncludedFiles, loadPackSet } from '../packs/discovery.js';
import type { PackSet } from '../packs/pack-set.js';
import { scanFiles } from '../scanner/scanner.js';
import type { FileReferences, ScanResult } from '../scanner/types.js';
import { logger } from '../../utils/logger.js';
import { toRelative } from '../../utils/file-system.js';
import { ConstantResolver } from './resolver.js';
import { PackChecker } from './checker.js';
import type { CheckResult, Violation } from './types.js';

/**
 * What is known about a project before its files are checked.
 */
export interface ProjectIndex {
  /** Absolute paths of every analyzed file, sorted */
  includedFiles: string[];
  packSet: PackSet;
  resolver: ConstantResolver;
}

export interface AnalysisResult extends CheckResult, ProjectIndex {
  /** Extraction results of the checked files */
  scanned: FileReferences[];
}

export interface AnalyzeOptions {
  /**
   * Absolute path → contents to check in place of the file on disk. The
   * path is analyzed even when it does not exist yet.
   */
  contents?: ReadonlyMap<string, string>;
}

/**
 * Scan `files`, reading and refreshing the cache when it is enabled.
 * Cache entries of files no longer included are dropped.
 */
async function scanWithCache(
  config: Configuration,
  files: readonly string[],
  includedFiles: readonly string[],
  contents?: ReadonlyMap<string, string>
): Promise<ScanResult> {
  let cache: CacheManager | undefined;
  if (config.cacheEnabled) {
    cache = new CacheManager(config.cacheDirectory, config.configChecksum);
    await cache.load();
  }

  const scan = await scanFiles(files, {
    projectRoot: config.projectRoot,
    cache,
    printFiles: config.printFiles,
    contents,
  });

  if (cache) {
    cache.prune(new Set(includedFiles.map((file) => toRelative(config.projectRoot, file))));
    await cache.save();
    const stats = cache.getStats();
    logger.debug(`Cache: ${stats.hits} hit(s), ${stats.misses} miss(es), ${stats.invalidated} invalidated`);
  }
  return scan;
}

/**
 * Build the project index. Under the experimental parser every included
 * file is scanned to collect definitions, and that scan is returned too.
 */
async function indexProject(
  config: Configuration,
  contents?: ReadonlyMap<string, string>
): Promise<{ index: ProjectIndex; fullScan: ScanResult | null }> {
  const discovered = await listIncludedFiles(config);
  const includedFiles = contents
    ? [...new Set([...discovered, ...contents.keys()])].sort()
    : discovered;
  const packSet = await loadPackSet(config, includedFiles);

  if (!config.experimentalParser) {
    const resolver = ConstantResolver.fromFileLayout(config.projectRoot, includedFiles, packSet);
    return { index: { includedFiles, packSet, resolver }, fullScan: null };
  }

  logger.debug('Using experimental parser');
  const fullScan = await scanWithCache(config, includedFiles, includedFiles, contents);
  const resolver = ConstantResolver.fromDefinitions(fullScan.files);
  return { index: { includedFiles, packSet, resolver }, fullScan };
}

/**
 * Discover the analyzed files and packs and find every constant's
 * defining file.
 */
export async function loadProjectIndex(config: Configuration): Promise<ProjectIndex> {
  const { index } = await indexProject(config);
  return index;
}

/**
 * Keep the requested files that are analyzed at all. Paths are resolved
 * against the project root.
 */
function selectTargets(
  config: Configuration,
  includedFiles: readonly string[],
  requested: readonly string[]
): string[] {
  const included = new Set(includedFiles);
  const targets: string[] = [];
  for (const file of requested) {
    const absolute = path.resolve(config.projectRoot, file);
    if (included.has(absolute)) {
      targets.push(absolute);
    } else {
      logger.warn(`Skipping ${file}: not included by packwerk.yml`);
    }
  }
  return targets;
}

/**
 * Violations not already listed in some package_todo.yml.
 */
export function filterRecorded(violations: readonly Violation[], packSet: PackSet): Violation[] {
  return violations.filter((violation) => !packSet.allViolations.has(violation.identifier));
}

/**
 * Run the whole pipeline.
 *
 * Constants are resolved against every included file, so a reference from
 * a requested file resolves even when its definition was not requested.
 *
 * @param requestedFiles - files to check; every included file when absent or empty
 */
export async function analyzeProject(
  config: Configuration,
  requestedFiles: readonly string[] = [],
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const { index, fullScan } = await indexProject(config, options.contents);
  const { includedFiles, packSet, resolver } = index;
  const targets =
    requestedFiles.length > 0 ? selectTargets(config, includedFiles, requestedFiles) : includedFiles;
  logger.debug(`Analyzing ${targets.length} of ${includedFiles.length} included file(s)`);

  let scanned: FileReferences[];
  if (fullScan) {
    const wanted = new Set(targets);
    scanned = fullScan.files.filter((file) => wanted.has(file.file));
  } else {
    scanned = (await scanWithCache(config, targets, includedFiles, options.contents)).files;
  }

  const checker = new PackChecker(config.projectRoot, packSet, resolver);
  const violations = checker.check(scanned);
  const reported = config.ignoreRecordedViolations
    ? violations
    : filterRecorded(violations, packSet);

  return {
    includedFiles,
    packSet,
    resolver,
    scanned,
    violations,
    reported,
    summary: {
      filesChecked: scanned.length,
      referencesAnalyzed: scanned.reduce((total, file) => total + file.references.length, 0),
      violationCount: reported.length,
    },
  };
}
