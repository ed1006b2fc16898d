/**
 * Pack discovery: which package.yml files exist, which files are analyzed,
 * and which package.yml is nearest to each analyzed file.
 */
import * as path from 'node:path';
import type { Configuration } from '../config/loader.js';
import { globFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { loadPack, PACKAGE_YML_FILE } from './package-yml.js';
import { PackSet } from './pack-set.js';
import type { Pack } from './types.js';

const ALWAYS_IGNORED = ['**/node_modules/**'];

/**
 * Absolute paths of every package.yml under the configured package paths,
 * plus the root one.
 */
export async function findPackageYmls(config: Configuration): Promise<string[]> {
  const patterns = [
    PACKAGE_YML_FILE,
    ...config.packagePaths.map((packagePath) => path.posix.join(packagePath, PACKAGE_YML_FILE)),
  ];
  const found = await globFiles(patterns, {
    cwd: config.projectRoot,
    ignore: [...ALWAYS_IGNORED, ...config.exclude],
    absolute: true,
  });
  return [...new Set(found.map((file) => path.normalize(file)))].sort();
}

/**
 * Absolute paths of the analyzed files, sorted.
 */
export async function listIncludedFiles(config: Configuration): Promise<string[]> {
  const found = await globFiles(config.include, {
    cwd: config.projectRoot,
    ignore: [...ALWAYS_IGNORED, ...config.exclude],
    absolute: true,
  });
  return [...new Set(found.map((file) => path.normalize(file)))].sort();
}

export async function loadPacks(config: Configuration): Promise<Pack[]> {
  const ymls = await findPackageYmls(config);
  logger.debug(`Found ${ymls.length} package.yml file(s)`);
  return Promise.all(ymls.map((yml) => loadPack(config.projectRoot, yml)));
}

/**
 * Map each file to the package.yml of the closest enclosing pack
 * directory. Files outside every pack (or outside the root) are omitted.
 */
export function owningPackageYmlForFiles(
  projectRoot: string,
  files: readonly string[],
  packageYmls: readonly string[]
): Map<string, string> {
  const ymlByDirectory = new Map<string, string>();
  for (const yml of packageYmls) {
    ymlByDirectory.set(path.dirname(yml), yml);
  }

  const owning = new Map<string, string>();
  for (const file of files) {
    let directory = path.dirname(file);
    for (;;) {
      const yml = ymlByDirectory.get(directory);
      if (yml !== undefined) {
        owning.set(file, yml);
        break;
      }
      const parent = path.dirname(directory);
      if (directory === projectRoot || parent === directory) break;
      directory = parent;
    }
  }
  return owning;
}

/**
 * Discover packs and build the ownership index for `files`.
 */
export async function loadPackSet(config: Configuration, files: readonly string[]): Promise<PackSet> {
  const packs = await loadPacks(config);
  const owning = owningPackageYmlForFiles(
    config.projectRoot,
    files,
    packs.map((pack) => pack.yml)
  );
  return PackSet.build(packs, owning);
}
