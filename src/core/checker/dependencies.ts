/**
 * Finds declared dependencies that no reference needs.
 */
import type { Configuration } from '../config/loader.js';
import { removeDependencies } from '../packs/editor.js';
import type { Pack } from '../packs/types.js';
import { PackChecker } from './checker.js';
import { analyzeProject } from './engine.js';

export interface UnnecessaryDependency {
  pack: Pack;
  /** The declared pack name */
  dependency: string;
}

/**
 * Dependencies whose pack no file of the declaring pack references,
 * ordered by pack then dependency name. Dependencies on packs that do not
 * exist are included.
 */
export async function findUnnecessaryDependencies(config: Configuration): Promise<UnnecessaryDependency[]> {
  const analysis = await analyzeProject(config);
  const checker = new PackChecker(config.projectRoot, analysis.packSet, analysis.resolver);
  const referenced = checker.referencedPacks(analysis.scanned);

  const unnecessary: UnnecessaryDependency[] = [];
  const packs = [...analysis.packSet.packs].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const pack of packs) {
    const used = referenced.get(pack.name);
    for (const dependency of [...pack.dependencies].sort()) {
      if (!used?.has(dependency)) {
        unnecessary.push({ pack, dependency });
      }
    }
  }
  return unnecessary;
}

/**
 * Remove the given dependencies from their packs' package.yml files.
 */
export async function removeUnnecessaryDependencies(unnecessary: readonly UnnecessaryDependency[]): Promise<void> {
  const byPack = new Map<Pack, string[]>();
  for (const { pack, dependency } of unnecessary) {
    byPack.set(pack, [...(byPack.get(pack) ?? []), dependency]);
  }
  for (const [pack, dependencies] of byPack) {
    await removeDependencies(pack, dependencies);
  }
}
