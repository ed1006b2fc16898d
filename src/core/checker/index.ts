/**
 * Checker module exports.
 */
export { PackChecker, isPublicFile } from './checker.js';
export {
  ConstantResolver,
  autoloadRelativePath,
  constantNameForPath,
  lookupCandidates,
} from './resolver.js';
export {
  analyzeProject,
  loadProjectIndex,
  filterRecorded,
  type AnalysisResult,
  type AnalyzeOptions,
  type ProjectIndex,
} from './engine.js';
export {
  findUnnecessaryDependencies,
  removeUnnecessaryDependencies,
  type UnnecessaryDependency,
} from './dependencies.js';
export { updatePackageTodos, type UpdateResult } from './update.js';
export type { CheckResult, ConstantDefinition, Violation } from './types.js';
