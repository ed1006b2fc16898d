/**
 * Shared tree-sitter helpers: parsing context, node text and offsets.
 */

import Parser from 'tree-sitter';
import type { Location } from '../types.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * The binding's default input buffer is 32 KiB; larger sources need a
 * buffer that fits the whole string.
 */
const DEFAULT_BUFFER_SIZE = 32 * 1024;

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  const bufferSize = Math.max(DEFAULT_BUFFER_SIZE, sourceCode.length * 2 + 1);
  const tree = parser.parse(sourceCode, undefined, { bufferSize });
  return { tree, sourceCode };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Raw offsets of a node.
 */
export function getNodeLocation(node: Parser.SyntaxNode): Location {
  return { begin: node.startIndex, end: node.endIndex };
}

/**
 * Whether two wrappers denote the same node. The binding hands out a new
 * wrapper object on every access, so identity comparison does not work.
 */
export function isSameNode(a: Parser.SyntaxNode, b: Parser.SyntaxNode): boolean {
  return a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;
}

/**
 * True if the tree under `node` contains an ERROR node or a node the
 * parser inserted to recover (shown as MISSING in the S-expression).
 */
export function containsSyntaxError(node: Parser.SyntaxNode): boolean {
  return /\((ERROR|MISSING)\b/.test(node.toString());
}
