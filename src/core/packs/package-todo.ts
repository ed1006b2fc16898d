/**
 * Reading and writing package_todo.yml, the list of violations a pack has
 * accepted for now.
 *
 * Layout, keyed by defining pack then constant:
 *
 * ```yaml
 * packs/bar:
 *   "::Bar":
 *     violations:
 *     - dependency
 *     files:
 *     - packs/foo/app/services/foo.rb
 * ```
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorCodes } from '../../utils/errors.js';
import { fileExists, removeFile } from '../../utils/file-system.js';
import { loadYamlWithSchema, writeYaml } from '../../utils/yaml.js';
import { logger } from '../../utils/logger.js';
import { isViolationType, type ViolationIdentifier } from './types.js';

export const PACKAGE_TODO_FILE = 'package_todo.yml';

const PackageTodoSchema = z.preprocess(
  (val) => val ?? {},
  z.record(
    z.string(),
    z.record(
      z.string(),
      z.object({
        violations: z.array(z.string()).default([]),
        files: z.array(z.string()).default([]),
      })
    )
  )
);

export type PackageTodo = z.infer<typeof PackageTodoSchema>;

/**
 * Recorded violations of the pack named `referencingPackName`, read from
 * `packageTodoPath`. A missing file means none.
 */
export async function readPackageTodo(
  packageTodoPath: string,
  referencingPackName: string
): Promise<ViolationIdentifier[]> {
  if (!(await fileExists(packageTodoPath))) {
    return [];
  }

  const todo = await loadYamlWithSchema(
    packageTodoPath,
    PackageTodoSchema,
    ErrorCodes.INVALID_PACKAGE_TODO
  );

  const violations: ViolationIdentifier[] = [];
  for (const [definingPackName, constants] of Object.entries(todo)) {
    for (const [constantName, entry] of Object.entries(constants)) {
      for (const violationType of entry.violations) {
        if (!isViolationType(violationType)) {
          logger.debug(`Ignoring unsupported violation type '${violationType}' in ${packageTodoPath}`);
          continue;
        }
        for (const file of entry.files) {
          violations.push({
            violationType,
            file,
            constantName,
            referencingPackName,
            definingPackName,
          });
        }
      }
    }
  }
  return violations;
}

/**
 * Group violations into the package_todo.yml layout, with every level
 * sorted so that rewrites produce stable diffs.
 */
export function buildPackageTodo(violations: readonly ViolationIdentifier[]): PackageTodo {
  const grouped = new Map<string, Map<string, { violations: Set<string>; files: Set<string> }>>();

  for (const violation of violations) {
    let constants = grouped.get(violation.definingPackName);
    if (!constants) {
      constants = new Map();
      grouped.set(violation.definingPackName, constants);
    }
    let entry = constants.get(violation.constantName);
    if (!entry) {
      entry = { violations: new Set(), files: new Set() };
      constants.set(violation.constantName, entry);
    }
    entry.violations.add(violation.violationType);
    entry.files.add(violation.file);
  }

  const todo: PackageTodo = {};
  for (const [definingPackName, constants] of sortedEntries(grouped)) {
    const byConstant: PackageTodo[string] = {};
    for (const [constantName, entry] of sortedEntries(constants)) {
      byConstant[constantName] = {
        violations: [...entry.violations].sort(),
        files: [...entry.files].sort(),
      };
    }
    todo[definingPackName] = byConstant;
  }
  return todo;
}

function sortedEntries<V>(map: ReadonlyMap<string, V>): Array<[string, V]> {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function packageTodoHeader(packName: string): string {
  return [
    '# This file contains a list of dependencies that are not part of the long term plan for the',
    `# '${packName}' package.`,
    '# We should generally work to reduce this list over time.',
    '#',
    '# You can regenerate this file using the following command:',
    '#',
    '# packscan update',
    '---',
    '',
  ].join('\n');
}

/**
 * Rewrite the package_todo.yml in `packDirectory`; remove it when there are
 * no violations left.
 */
export async function writePackageTodo(
  packDirectory: string,
  packName: string,
  violations: readonly ViolationIdentifier[]
): Promise<void> {
  const todoPath = path.join(packDirectory, PACKAGE_TODO_FILE);
  if (violations.length === 0) {
    await removeFile(todoPath);
    return;
  }
  await writeYaml(todoPath, buildPackageTodo(violations), packageTodoHeader(packName));
}
