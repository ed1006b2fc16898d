/**
 * Data model shared by the extractor, the scanner and the checker.
 */

/** Raw offset pair as reported by the parser (UTF-16 code units). */
export interface Location {
  begin: number;
  end: number;
}

/** 1-based source range. */
export interface Range {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/**
 * A use of a constant.
 */
export interface Reference {
  /** The constant path as written, e.g. `Foo`, `A::B` or `::C` */
  name: string;
  /** Enclosing fully-qualified namespaces, innermost first; empty at top level */
  moduleNesting: string[];
  location: Range;
}

/** A reference before its offsets are mapped to rows and columns. */
export interface ParsedReference {
  name: string;
  moduleNesting: string[];
  location: Location;
}

/**
 * A point where a constant is declared (class or constant assignment).
 */
export interface Definition {
  fullyQualifiedName: string;
  location: Location;
}

/**
 * Result of resolving a constant path expression.
 * `dynamic` means the path is built at runtime (method call, variable, self).
 */
export type NameResolution =
  | { kind: 'resolved'; name: string }
  | { kind: 'dynamic' };

export interface ExtractionResult {
  /** References left after same-file definitions are filtered out */
  references: Reference[];
  definitions: Definition[];
}
