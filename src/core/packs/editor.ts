/**
 * Commands that write package.yml files. Every write goes through
 * {@link writePackageYml}, so touched files end up in canonical form.
 */
import * as path from 'node:path';
import type { Configuration } from '../config/loader.js';
import { fileExists, readFile, toRelative } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { findPackageYmls, loadPackSet } from './discovery.js';
import {
  PACKAGE_YML_FILE,
  formatPackageYml,
  readRawPackageYml,
  writePackageYml,
  type RawPackageYml,
} from './package-yml.js';
import type { Pack } from './types.js';

/**
 * Outcome of an edit. A rejected edit wrote nothing.
 */
export type EditOutcome =
  | { status: 'changed'; message: string }
  | { status: 'unchanged'; message: string }
  | { status: 'rejected'; message: string };

/** package.yml of a newly created pack */
export const NEW_PACK_YML: RawPackageYml = {
  enforce_dependencies: true,
  enforce_privacy: true,
};

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Create `<name>/package.yml`. The name is a project-relative directory.
 */
export async function createPack(config: Configuration, packName: string): Promise<EditOutcome> {
  const name = packName.endsWith('/') ? packName.slice(0, -1) : packName;
  if (name === '' || name === '.' || path.isAbsolute(name) || name.split('/').includes('..')) {
    return { status: 'rejected', message: `'${packName}' is not a directory inside the project` };
  }

  const yml = path.join(config.projectRoot, name, PACKAGE_YML_FILE);
  if (await fileExists(yml)) {
    return { status: 'rejected', message: `A pack already exists at ${toRelative(config.projectRoot, yml)}` };
  }

  await writePackageYml(yml, NEW_PACK_YML);
  const created = `Created ${toRelative(config.projectRoot, yml)}`;
  if (!(await findPackageYmls(config)).includes(yml)) {
    return {
      status: 'changed',
      message: `${created}, but packwerk.yml package_paths does not include it`,
    };
  }
  return { status: 'changed', message: created };
}

/**
 * Declare that pack `from` depends on pack `to`.
 */
export async function addDependency(config: Configuration, from: string, to: string): Promise<EditOutcome> {
  const packSet = await loadPackSet(config, []);
  const fromLookup = packSet.forPack(from);
  if (!fromLookup.found) {
    return { status: 'rejected', message: `${fromLookup.message} (${from})` };
  }
  const toLookup = packSet.forPack(to);
  if (!toLookup.found) {
    return { status: 'rejected', message: `${toLookup.message} (${to})` };
  }

  const fromPack = fromLookup.pack;
  const toPack = toLookup.pack;
  if (fromPack.name === toPack.name) {
    return { status: 'rejected', message: `${fromPack.name} cannot depend on itself` };
  }
  if (fromPack.dependencies.includes(toPack.name)) {
    return { status: 'unchanged', message: `${fromPack.name} already depends on ${toPack.name}` };
  }

  const raw = await readRawPackageYml(fromPack.yml);
  await writePackageYml(fromPack.yml, {
    ...raw,
    dependencies: [...stringList(raw['dependencies']), toPack.name],
  });
  return {
    status: 'changed',
    message: `Added ${toPack.name} to the dependencies of ${fromPack.name}`,
  };
}

/**
 * Drop `dependencies` from the package.yml of `pack`.
 */
export async function removeDependencies(pack: Pack, dependencies: readonly string[]): Promise<void> {
  const dropped = new Set(dependencies);
  const raw = await readRawPackageYml(pack.yml);
  await writePackageYml(pack.yml, {
    ...raw,
    dependencies: stringList(raw['dependencies']).filter((name) => !dropped.has(name)),
  });
  logger.debug(`Removed ${[...dropped].join(', ')} from the dependencies of ${pack.name}`);
}

/**
 * Rewrite every package.yml not already in canonical form.
 *
 * @returns project-relative paths of the rewritten files, sorted
 */
export async function lintPackageYmls(config: Configuration): Promise<string[]> {
  const rewritten: string[] = [];
  for (const yml of await findPackageYmls(config)) {
    const raw = await readRawPackageYml(yml);
    if ((await readFile(yml)) !== formatPackageYml(raw)) {
      await writePackageYml(yml, raw);
      rewritten.push(toRelative(config.projectRoot, yml));
    }
  }
  return rewritten;
}
