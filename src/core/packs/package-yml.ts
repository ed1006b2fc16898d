/**
 * package.yml parsing and writing.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorCodes } from '../../utils/errors.js';
import { loadYamlWithSchema, stringifyYaml, writeYaml } from '../../utils/yaml.js';
import { PACKAGE_TODO_FILE, readPackageTodo } from './package-todo.js';
import { ROOT_PACK_NAME, type Pack } from './types.js';

export const PACKAGE_YML_FILE = 'package.yml';
export const DEFAULT_PUBLIC_PATH = 'app/public';

/** `true` and `strict` both turn a checker on. */
const EnforcementSchema = z
  .union([z.boolean(), z.literal('strict')])
  .default(false)
  .transform((value) => value !== false);

export const PackageYmlSchema = z.preprocess(
  (val) => val ?? {},
  z.object({
    enforce_dependencies: EnforcementSchema,
    enforce_privacy: EnforcementSchema,
    dependencies: z.array(z.string()).default([]),
    ignored_dependencies: z.array(z.string()).default([]),
    public_path: z.string().default(DEFAULT_PUBLIC_PATH),
    metadata: z.record(z.string(), z.unknown()).default({}),
  })
);

export type PackageYml = z.infer<typeof PackageYmlSchema>;

/**
 * Project-relative pack name for a package.yml: its directory, or `.`.
 */
export function packNameForYml(projectRoot: string, ymlPath: string): string {
  const relative = path.relative(projectRoot, path.dirname(ymlPath)).split(path.sep).join('/');
  return relative === '' ? ROOT_PACK_NAME : relative;
}

/**
 * Load the pack configured by `ymlPath` along with its recorded violations.
 */
export async function loadPack(projectRoot: string, ymlPath: string): Promise<Pack> {
  const directory = path.dirname(ymlPath);
  const name = packNameForYml(projectRoot, ymlPath);
  const config = await loadYamlWithSchema(ymlPath, PackageYmlSchema, ErrorCodes.INVALID_PACKAGE_YML);
  const recordedViolations = await readPackageTodo(path.join(directory, PACKAGE_TODO_FILE), name);

  return {
    name,
    yml: ymlPath,
    directory,
    enforceDependencies: config.enforce_dependencies,
    enforcePrivacy: config.enforce_privacy,
    dependencies: config.dependencies,
    ignoredDependencies: config.ignored_dependencies,
    publicPath: config.public_path.replace(/\/+$/, ''),
    metadata: config.metadata,
    recordedViolations,
  };
}

/** Keys in the order package.yml files are written; other keys follow alphabetically. */
export const PACKAGE_YML_KEY_ORDER = [
  'enforce_dependencies',
  'enforce_privacy',
  'public_path',
  'dependencies',
  'ignored_dependencies',
  'metadata',
] as const;

const PACK_LIST_KEYS: ReadonlySet<string> = new Set(['dependencies', 'ignored_dependencies']);

const RawPackageYmlSchema = z.preprocess((val) => val ?? {}, z.record(z.string(), z.unknown()));

/** A package.yml as written, unknown keys included. */
export type RawPackageYml = Record<string, unknown>;

export async function readRawPackageYml(ymlPath: string): Promise<RawPackageYml> {
  return loadYamlWithSchema(ymlPath, RawPackageYmlSchema, ErrorCodes.INVALID_PACKAGE_YML);
}

/** Lists of pack names are sorted and deduplicated; anything else is kept. */
function sortPackList(value: unknown): unknown {
  if (!Array.isArray(value)) return value;
  const names = value.filter((item): item is string => typeof item === 'string');
  if (names.length !== value.length) return value;
  return [...new Set(names)].sort();
}

/**
 * Canonical form of a package.yml: known keys first in
 * {@link PACKAGE_YML_KEY_ORDER}, pack lists sorted.
 */
export function normalizePackageYml(raw: RawPackageYml): RawPackageYml {
  const normalized: RawPackageYml = {};
  const known: readonly string[] = PACKAGE_YML_KEY_ORDER;
  const keys = [
    ...known.filter((key) => key in raw),
    ...Object.keys(raw)
      .filter((key) => !known.includes(key))
      .sort(),
  ];
  for (const key of keys) {
    normalized[key] = PACK_LIST_KEYS.has(key) ? sortPackList(raw[key]) : raw[key];
  }
  return normalized;
}

/** Serialize a package.yml in canonical form. */
export function formatPackageYml(raw: RawPackageYml): string {
  return stringifyYaml(normalizePackageYml(raw));
}

export async function writePackageYml(ymlPath: string, raw: RawPackageYml): Promise<void> {
  await writeYaml(ymlPath, normalizePackageYml(raw));
}
