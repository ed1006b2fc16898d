/**
 * Parser module exports.
 */
export {
  ReferenceExtractor,
  extractFromContents,
  resolveConstantName,
  calculateModuleNesting,
  possibleFullyQualifiedNames,
  filterLocalReferences,
} from './extractor.js';
export { createLocationMapper, toRange, type LocationMapper, type Position } from './location.js';
export { createRubyParser } from './tree-sitter/ruby-ast.js';
export type {
  Reference,
  ParsedReference,
  Definition,
  Location,
  Range,
  NameResolution,
  ExtractionResult,
} from './types.js';
