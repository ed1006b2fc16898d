/**
 * Ruby parser construction and the tree-sitter-ruby node kinds the
 * extractor cares about.
 */

import Parser from 'tree-sitter';
import Ruby from 'tree-sitter-ruby';

/** Scope-opening nodes */
export const RubyScopeNodes = {
  CLASS: 'class',
  MODULE: 'module',
} as const;

/** Constant paths */
export const RubyConstantNodes = {
  CONSTANT: 'constant',
  SCOPE_RESOLUTION: 'scope_resolution',
} as const;

/** Assignment forms that can define a constant */
export const RubyAssignmentNodes = {
  ASSIGNMENT: 'assignment',
  OPERATOR_ASSIGNMENT: 'operator_assignment',
  LEFT_ASSIGNMENT_LIST: 'left_assignment_list',
  DESTRUCTURED_LEFT_ASSIGNMENT: 'destructured_left_assignment',
  REST_ASSIGNMENT: 'rest_assignment',
} as const;

export const RubyExpressionNodes = {
  CALL: 'call',
  COMMENT: 'comment',
} as const;

/** Field names used on class, module, scope_resolution, assignment and call nodes */
export const RubyFields = {
  NAME: 'name',
  SUPERCLASS: 'superclass',
  BODY: 'body',
  SCOPE: 'scope',
  LEFT: 'left',
  RIGHT: 'right',
  METHOD: 'method',
} as const;

/**
 * Creates a Ruby parser instance.
 *
 * Note: tree-sitter 0.21's declarations type the language argument of
 * `setLanguage` as `any`, so the grammar object is passed as is.
 */
export function createRubyParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Ruby);
  return parser;
}
