/**
 * Pack configuration validation: declared pack names must exist and the
 * dependency graph must be acyclic.
 */
import { toRelative } from '../../utils/file-system.js';
import type { Pack } from './types.js';

export interface PackValidationResult {
  valid: boolean;
  /** One message per problem, in pack name order; cycles come last */
  errors: string[];
}

/**
 * Cycles in the dependency graph, each as the pack names along it with
 * the first repeated at the end. A cycle is reported once, from the
 * first pack (by name) the search reaches it from.
 */
export function findDependencyCycles(packs: readonly Pack[]): string[][] {
  const byName = new Map(packs.map((pack) => [pack.name, pack]));
  const names = [...byName.keys()].sort();
  const cycles: string[][] = [];
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const pathStack: string[] = [];

  const dfs = (name: string): void => {
    visited.add(name);
    recursionStack.add(name);
    pathStack.push(name);

    const dependencies = [...(byName.get(name)?.dependencies ?? [])].sort();
    for (const dependency of dependencies) {
      if (!byName.has(dependency)) continue;
      if (!visited.has(dependency)) {
        dfs(dependency);
      } else if (recursionStack.has(dependency)) {
        const cycle = [...pathStack.slice(pathStack.indexOf(dependency)), dependency];
        const cycleKey = [...new Set(cycle)].sort().join('|');
        if (!cycles.some((c) => [...new Set(c)].sort().join('|') === cycleKey)) {
          cycles.push(cycle);
        }
      }
    }

    pathStack.pop();
    recursionStack.delete(name);
  };

  for (const name of names) {
    if (!visited.has(name)) {
      dfs(name);
    }
  }
  return cycles;
}

export function validatePacks(projectRoot: string, packs: readonly Pack[]): PackValidationResult {
  const known = new Set(packs.map((pack) => pack.name));
  const errors: string[] = [];

  const sorted = [...packs].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const pack of sorted) {
    const yml = toRelative(projectRoot, pack.yml);
    const lists: Array<[string, string[]]> = [
      ['dependencies', pack.dependencies],
      ['ignored_dependencies', pack.ignoredDependencies],
    ];
    for (const [key, names] of lists) {
      for (const name of names) {
        if (!known.has(name)) {
          errors.push(`Invalid '${key}' in '${yml}'. '${name}' does not point to a valid pack.`);
        }
      }
    }
  }

  const cycles = findDependencyCycles(packs);
  if (cycles.length > 0) {
    errors.push(
      'Expected the pack dependency graph to be acyclic, but it contains the following cycle(s):\n\n' +
        cycles.map((cycle) => `\t- ${cycle.join(' → ')}`).join('\n')
    );
  }

  return { valid: errors.length === 0, errors };
}
