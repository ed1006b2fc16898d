/**
 * Pack model and recorded violation identifiers.
 */

export const ROOT_PACK_NAME = '.';

export const VIOLATION_TYPES = ['dependency', 'privacy'] as const;

export type ViolationType = (typeof VIOLATION_TYPES)[number];

export function isViolationType(value: string): value is ViolationType {
  return (VIOLATION_TYPES as readonly string[]).includes(value);
}

/**
 * Identifies one violation independently of where it was detected.
 * Two identifiers are equal when all fields are equal.
 */
export interface ViolationIdentifier {
  violationType: ViolationType;
  /** Project-relative path of the referencing file */
  file: string;
  /** Fully-qualified constant, e.g. `::Bar` */
  constantName: string;
  referencingPackName: string;
  definingPackName: string;
}

/**
 * A directory-scoped unit of ownership configured by a package.yml.
 */
export interface Pack {
  /** Project-relative directory, `.` for the root pack */
  name: string;
  /** Absolute path of the pack's package.yml */
  yml: string;
  /** Absolute pack directory */
  directory: string;
  enforceDependencies: boolean;
  enforcePrivacy: boolean;
  /** Names of packs this pack may reference */
  dependencies: string[];
  /** Names of packs whose references are never reported as dependency violations */
  ignoredDependencies: string[];
  /** Directory of public constants, relative to the pack directory */
  publicPath: string;
  metadata: Record<string, unknown>;
  /** Violations recorded in the pack's package_todo.yml */
  recordedViolations: ViolationIdentifier[];
}
