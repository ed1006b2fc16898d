/**
 * Pack module exports.
 */
export { PackSet, comparePacks, type PackLookup } from './pack-set.js';
export { ViolationSet, violationKey } from './violation-set.js';
export {
  findPackageYmls,
  listIncludedFiles,
  loadPacks,
  loadPackSet,
  owningPackageYmlForFiles,
} from './discovery.js';
export {
  loadPack,
  packNameForYml,
  readRawPackageYml,
  normalizePackageYml,
  formatPackageYml,
  writePackageYml,
  PACKAGE_YML_FILE,
  PACKAGE_YML_KEY_ORDER,
  DEFAULT_PUBLIC_PATH,
  type RawPackageYml,
} from './package-yml.js';
export {
  createPack,
  addDependency,
  removeDependencies,
  lintPackageYmls,
  NEW_PACK_YML,
  type EditOutcome,
} from './editor.js';
export { validatePacks, findDependencyCycles, type PackValidationResult } from './validator.js';
export {
  readPackageTodo,
  writePackageTodo,
  buildPackageTodo,
  PACKAGE_TODO_FILE,
  type PackageTodo,
} from './package-todo.js';
export {
  ROOT_PACK_NAME,
  VIOLATION_TYPES,
  isViolationType,
  type Pack,
  type ViolationIdentifier,
  type ViolationType,
} from './types.js';
