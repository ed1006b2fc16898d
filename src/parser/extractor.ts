/**
 * Constant reference and definition extraction for Ruby sources.
 *
 * The visitor walks the tree depth-first, keeping the stack of enclosing
 * class/module names so that every reference carries the value
 * `Module.nesting` would have at that point. References to constants the
 * same file defines in an enclosing scope are dropped afterwards.
 */

import type Parser from 'tree-sitter';
import { ExtractionError, ErrorCodes } from '../utils/errors.js';
import type {
  Definition,
  ExtractionResult,
  Location,
  NameResolution,
  ParsedReference,
  Reference,
} from './types.js';
import { createLocationMapper, toRange } from './location.js';
import {
  createContext,
  containsSyntaxError,
  getNodeLocation,
  getNodeText,
  isSameNode,
} from './tree-sitter/TreeSitterUtils.js';
import {
  createRubyParser,
  RubyAssignmentNodes,
  RubyConstantNodes,
  RubyExpressionNodes,
  RubyFields,
  RubyScopeNodes,
} from './tree-sitter/ruby-ast.js';

const DYNAMIC: NameResolution = { kind: 'dynamic' };

/**
 * Resolve a constant path expression to its written, fully spelled name.
 *
 * `Foo` → `Foo`, `Foo::Bar` → `Foo::Bar`, `::Foo` → `::Foo`.
 * Any non-constant scope (`foo::Bar`, `self::Bar`, `@x::Bar`) is dynamic.
 */
export function resolveConstantName(
  node: Parser.SyntaxNode,
  sourceCode: string
): NameResolution {
  switch (node.type) {
    case RubyConstantNodes.CONSTANT:
      return { kind: 'resolved', name: getNodeText(node, sourceCode) };

    case RubyConstantNodes.SCOPE_RESOLUTION: {
      const nameNode = node.childForFieldName(RubyFields.NAME);
      if (!nameNode || nameNode.type !== RubyConstantNodes.CONSTANT) {
        return DYNAMIC;
      }
      const name = getNodeText(nameNode, sourceCode);

      const scope = node.childForFieldName(RubyFields.SCOPE);
      if (!scope) {
        // Top-level scope: the parent resolves to the empty string
        return { kind: 'resolved', name: `::${name}` };
      }

      const parent = resolveConstantName(scope, sourceCode);
      if (parent.kind === 'dynamic') return parent;
      return { kind: 'resolved', name: `${parent.name}::${name}` };
    }

    default:
      return DYNAMIC;
  }
}

/**
 * `Module.nesting` for a stack of namespaces given outermost first.
 *
 * @example calculateModuleNesting(['Foo', 'Bar', 'Baz'])
 * // => ['Foo::Bar::Baz', 'Foo::Bar', 'Foo']
 */
export function calculateModuleNesting(namespaces: readonly string[]): string[] {
  const nesting: string[] = [];
  let previous = '';
  for (const namespace of namespaces) {
    previous = previous === '' ? namespace : `${previous}::${namespace}`;
    nesting.unshift(previous);
  }
  return nesting;
}

/**
 * Every fully-qualified name a reference could denote through its nesting.
 */
export function possibleFullyQualifiedNames(
  reference: Pick<ParsedReference, 'name' | 'moduleNesting'>
): string[] {
  return reference.moduleNesting.map((nesting) => `${nesting}::${reference.name}`);
}

/**
 * Drop references that resolve, through some level of their nesting, to a
 * definition in the same file.
 */
export function filterLocalReferences<T extends Pick<ParsedReference, 'name' | 'moduleNesting'>>(
  references: readonly T[],
  definitions: readonly Definition[]
): T[] {
  const defined = new Set(definitions.map((d) => d.fullyQualifiedName));
  return references.filter(
    (reference) => !possibleFullyQualifiedNames(reference).some((name) => defined.has(name))
  );
}

/**
 * Traversal state for one file. The namespace stack and both output lists
 * change only through the methods below.
 */
class ExtractionContext {
  private readonly namespaces: string[] = [];
  readonly references: ParsedReference[] = [];
  readonly definitions: Definition[] = [];

  constructor(readonly sourceCode: string) {}

  pushNamespace(name: string): void {
    this.namespaces.push(name);
  }

  popNamespace(): void {
    this.namespaces.pop();
  }

  recordReference(name: string, location: Location): void {
    this.references.push({
      name,
      moduleNesting: calculateModuleNesting(this.namespaces),
      location,
    });
  }

  recordDefinition(name: string, location: Location): void {
    this.definitions.push({
      fullyQualifiedName: [...this.namespaces, name].join('::'),
      location,
    });
  }
}

function visit(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  switch (node.type) {
    case RubyScopeNodes.CLASS:
      visitClass(node, ctx);
      return;
    case RubyScopeNodes.MODULE:
      visitModule(node, ctx);
      return;
    case RubyConstantNodes.CONSTANT:
    case RubyConstantNodes.SCOPE_RESOLUTION:
      visitConstantReference(node, ctx);
      return;
    case RubyAssignmentNodes.ASSIGNMENT:
    case RubyAssignmentNodes.OPERATOR_ASSIGNMENT:
      visitAssignment(node, ctx);
      return;
    case RubyExpressionNodes.CALL:
      visitCall(node, ctx);
      return;
    default:
      visitChildren(node, ctx);
  }
}

function visitChildren(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  for (const child of node.namedChildren) {
    visit(child, ctx);
  }
}

/**
 * Statements between the header of a class/module and its `end`.
 * Grammar versions with a `body` field return that node; older ones inline
 * the statements, so everything except the header fields is taken.
 */
function scopeBody(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const body = node.childForFieldName(RubyFields.BODY);
  if (body) return [body];

  const header = [
    node.childForFieldName(RubyFields.NAME),
    node.childForFieldName(RubyFields.SUPERCLASS),
  ].filter((n): n is Parser.SyntaxNode => n !== null);

  return node.namedChildren.filter(
    (child) =>
      child.type !== RubyExpressionNodes.COMMENT &&
      !header.some((h) => isSameNode(h, child))
  );
}

function visitClass(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  const nameNode = node.childForFieldName(RubyFields.NAME);
  if (!nameNode) return;

  // A class whose name is built at runtime is opaque: nothing inside it is collected
  const resolution = resolveConstantName(nameNode, ctx.sourceCode);
  if (resolution.kind === 'dynamic') return;

  const body = scopeBody(node);
  if (body.length === 0) {
    // `class Foo; end` only touches the constant
    ctx.recordReference(resolution.name, getNodeLocation(nameNode));
  }

  // The superclass is looked up in the enclosing scope
  const superclass = node.childForFieldName(RubyFields.SUPERCLASS);
  if (superclass) visit(superclass, ctx);

  ctx.recordDefinition(resolution.name, getNodeLocation(node));

  ctx.pushNamespace(resolution.name);
  for (const statement of body) {
    visit(statement, ctx);
  }
  ctx.popNamespace();
}

function visitModule(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  const nameNode = node.childForFieldName(RubyFields.NAME);
  if (!nameNode) return;

  const resolution = resolveConstantName(nameNode, ctx.sourceCode);
  if (resolution.kind === 'dynamic') {
    throw new ExtractionError(
      ErrorCodes.DYNAMIC_MODULE_NAME,
      `Module name cannot be resolved statically: ${getNodeText(nameNode, ctx.sourceCode)}`,
      { location: getNodeLocation(nameNode) }
    );
  }

  ctx.pushNamespace(resolution.name);
  for (const statement of scopeBody(node)) {
    visit(statement, ctx);
  }
  ctx.popNamespace();
}

function visitConstantReference(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  const resolution = resolveConstantName(node, ctx.sourceCode);
  if (resolution.kind === 'resolved') {
    ctx.recordReference(resolution.name, getNodeLocation(node));
    return;
  }

  // `Foo::bar` is a method call on Foo, not a constant path
  const nameNode = node.childForFieldName(RubyFields.NAME);
  const scope = node.childForFieldName(RubyFields.SCOPE);
  if (nameNode && nameNode.type !== RubyConstantNodes.CONSTANT && scope) {
    visit(scope, ctx);
  }
}

function visitAssignment(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  const left = node.childForFieldName(RubyFields.LEFT);
  if (left) visitAssignmentTarget(left, node, ctx);

  const right = node.childForFieldName(RubyFields.RIGHT);
  if (right) visit(right, ctx);
}

function visitAssignmentTarget(
  target: Parser.SyntaxNode,
  assignment: Parser.SyntaxNode,
  ctx: ExtractionContext
): void {
  switch (target.type) {
    case RubyConstantNodes.CONSTANT:
    case RubyConstantNodes.SCOPE_RESOLUTION: {
      const resolution = resolveConstantName(target, ctx.sourceCode);
      if (resolution.kind === 'resolved') {
        ctx.recordDefinition(resolution.name, getNodeLocation(assignment));
      }
      return;
    }
    case RubyAssignmentNodes.LEFT_ASSIGNMENT_LIST:
    case RubyAssignmentNodes.DESTRUCTURED_LEFT_ASSIGNMENT:
    case RubyAssignmentNodes.REST_ASSIGNMENT:
      for (const child of target.namedChildren) {
        visitAssignmentTarget(child, child, ctx);
      }
      return;
    default:
      // Attribute and element writes (`Foo.bar = 1`, `x[Foo] = 1`)
      visit(target, ctx);
  }
}

/**
 * A constant in method position (`Foo(1)`) names a method, not a constant.
 */
function visitCall(node: Parser.SyntaxNode, ctx: ExtractionContext): void {
  const method = node.childForFieldName(RubyFields.METHOD);
  for (const child of node.namedChildren) {
    if (
      method &&
      method.type === RubyConstantNodes.CONSTANT &&
      isSameNode(method, child)
    ) {
      continue;
    }
    visit(child, ctx);
  }
}

/**
 * Extracts constant references and definitions from Ruby sources.
 * One instance owns one native parser; parsing is synchronous, so an
 * instance can serve any number of files one after another.
 */
export class ReferenceExtractor {
  private readonly parser: Parser;

  constructor(parser?: Parser) {
    this.parser = parser ?? createRubyParser();
  }

  /**
   * Filtered references (with rows and columns) plus the file's definitions.
   * A source that does not parse cleanly, or is empty, yields nothing.
   */
  extract(contents: string): ExtractionResult {
    const { tree, sourceCode } = createContext(this.parser, contents);
    const root = tree.rootNode;
    if (containsSyntaxError(root)) {
      return { references: [], definitions: [] };
    }

    const ctx = new ExtractionContext(sourceCode);
    visit(root, ctx);

    const mapper = createLocationMapper(sourceCode);
    const references: Reference[] = filterLocalReferences(ctx.references, ctx.definitions).map(
      (reference) => ({
        name: reference.name,
        moduleNesting: reference.moduleNesting,
        location: toRange(mapper, reference.location),
      })
    );

    return { references, definitions: ctx.definitions };
  }

  extractReferences(contents: string): Reference[] {
    return this.extract(contents).references;
  }
}

let defaultExtractor: ReferenceExtractor | null = null;

/**
 * References of one file's contents, using a process-wide extractor.
 */
export function extractFromContents(contents: string): Reference[] {
  if (!defaultExtractor) {
    defaultExtractor = new ReferenceExtractor();
  }
  return defaultExtractor.extractReferences(contents);
}
