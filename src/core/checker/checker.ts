/**
 * Pack boundary checker - turns resolved constant references into
 * dependency and privacy violations.
 */
import * as path from 'node:path';
import type { Reference } from '../../parser/types.js';
import type { FileReferences } from '../scanner/types.js';
import type { PackSet } from '../packs/pack-set.js';
import type { Pack, ViolationIdentifier, ViolationType } from '../packs/types.js';
import { toRelative } from '../../utils/file-system.js';
import type { ConstantResolver } from './resolver.js';
import type { ConstantDefinition, Violation } from './types.js';

/**
 * Whether `file` lies inside the public directory of `pack`.
 */
export function isPublicFile(pack: Pack, file: string): boolean {
  const publicDirectory = path.resolve(pack.directory, pack.publicPath);
  const relative = path.relative(publicDirectory, file);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Checks references against the dependency and privacy rules of the packs
 * they cross.
 *
 * A reference is checked only when both its file and the file defining the
 * constant belong to a pack, and the two packs differ.
 */
export class PackChecker {
  constructor(
    private readonly projectRoot: string,
    private readonly packSet: PackSet,
    private readonly resolver: ConstantResolver
  ) {}

  /**
   * Violations of every scanned file, ordered by file then position.
   */
  check(files: readonly FileReferences[]): Violation[] {
    const violations: Violation[] = [];
    for (const fileReferences of files) {
      for (const reference of fileReferences.references) {
        violations.push(...this.checkReference(fileReferences, reference));
      }
    }
    return violations.sort(compareViolations);
  }

  /**
   * For each referencing pack, the names of the other packs whose
   * constants its files reference, whatever the enforcement settings.
   */
  referencedPacks(files: readonly FileReferences[]): Map<string, Set<string>> {
    const referenced = new Map<string, Set<string>>();
    for (const fileReferences of files) {
      const referencingPack = this.packSet.forFile(fileReferences.file);
      if (!referencingPack) continue;

      for (const reference of fileReferences.references) {
        const definition = this.resolver.resolve(reference);
        if (!definition) continue;
        const definingPack = this.packSet.forFile(definition.file);
        if (!definingPack || definingPack.name === referencingPack.name) continue;

        const names = referenced.get(referencingPack.name) ?? new Set<string>();
        names.add(definingPack.name);
        referenced.set(referencingPack.name, names);
      }
    }
    return referenced;
  }

  private checkReference(fileReferences: FileReferences, reference: Reference): Violation[] {
    const referencingPack = this.packSet.forFile(fileReferences.file);
    if (!referencingPack) return [];

    const definition = this.resolver.resolve(reference);
    if (!definition) return [];

    const definingPack = this.packSet.forFile(definition.file);
    if (!definingPack || definingPack.name === referencingPack.name) return [];

    const violations: Violation[] = [];
    if (this.isDependencyViolation(referencingPack, definingPack)) {
      violations.push(
        this.createViolation('dependency', fileReferences, reference, definition, referencingPack, definingPack)
      );
    }
    if (definingPack.enforcePrivacy && !isPublicFile(definingPack, definition.file)) {
      violations.push(
        this.createViolation('privacy', fileReferences, reference, definition, referencingPack, definingPack)
      );
    }
    return violations;
  }

  private isDependencyViolation(referencingPack: Pack, definingPack: Pack): boolean {
    return (
      referencingPack.enforceDependencies &&
      !referencingPack.dependencies.includes(definingPack.name) &&
      !referencingPack.ignoredDependencies.includes(definingPack.name)
    );
  }

  private createViolation(
    violationType: ViolationType,
    fileReferences: FileReferences,
    reference: Reference,
    definition: ConstantDefinition,
    referencingPack: Pack,
    definingPack: Pack
  ): Violation {
    const identifier: ViolationIdentifier = {
      violationType,
      file: fileReferences.relativePath,
      constantName: definition.constantName,
      referencingPackName: referencingPack.name,
      definingPackName: definingPack.name,
    };
    const site = `${fileReferences.relativePath}:${reference.location.startRow}`;
    const message =
      violationType === 'dependency'
        ? `dependency: ${site} references ${definition.constantName} from ${definingPack.name} ` +
          `without an explicit dependency in ${toRelative(this.projectRoot, referencingPack.yml)}`
        : `privacy: ${site} references private constant ${definition.constantName} from ${definingPack.name}`;

    return { identifier, location: reference.location, message };
  }
}

function compareViolations(a: Violation, b: Violation): number {
  if (a.identifier.file !== b.identifier.file) {
    return a.identifier.file < b.identifier.file ? -1 : 1;
  }
  if (a.location.startRow !== b.location.startRow) {
    return a.location.startRow - b.location.startRow;
  }
  if (a.location.startCol !== b.location.startCol) {
    return a.location.startCol - b.location.startCol;
  }
  if (a.identifier.violationType === b.identifier.violationType) return 0;
  return a.identifier.violationType < b.identifier.violationType ? -1 : 1;
}
