/**
 * Rewrites every pack's package_todo.yml from a fresh analysis.
 */
import type { Configuration } from '../config/loader.js';
import { writePackageTodo } from '../packs/package-todo.js';
import type { ViolationIdentifier } from '../packs/types.js';
import { logger } from '../../utils/logger.js';
import { analyzeProject } from './engine.js';

export interface UpdateResult {
  /** Violations written, across all packs */
  violationCount: number;
  /** Names of the packs left with a package_todo.yml */
  packsWithTodos: string[];
}

/**
 * Record every current violation, replacing what was recorded before.
 * Packs without violations lose their package_todo.yml.
 */
export async function updatePackageTodos(config: Configuration): Promise<UpdateResult> {
  const analysis = await analyzeProject(config);

  const byReferencingPack = new Map<string, ViolationIdentifier[]>();
  for (const violation of analysis.violations) {
    const name = violation.identifier.referencingPackName;
    const existing = byReferencingPack.get(name);
    if (existing) {
      existing.push(violation.identifier);
    } else {
      byReferencingPack.set(name, [violation.identifier]);
    }
  }

  const packsWithTodos: string[] = [];
  for (const pack of analysis.packSet.packs) {
    const violations = byReferencingPack.get(pack.name) ?? [];
    await writePackageTodo(pack.directory, pack.name, violations);
    if (violations.length > 0) {
      packsWithTodos.push(pack.name);
      logger.debug(`Recorded ${violations.length} violation(s) for ${pack.name}`);
    }
  }

  return { violationCount: analysis.violations.length, packsWithTodos: packsWithTodos.sort() };
}
