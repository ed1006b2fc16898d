/**
 * Types for pack boundary checking.
 */
import type { Range } from '../../parser/types.js';
import type { ViolationIdentifier } from '../packs/types.js';

/**
 * Where a constant is defined, inferred from the file layout or parsed.
 */
export interface ConstantDefinition {
  /** Fully-qualified name with a leading `::`, e.g. `::Foo::BarBaz` */
  constantName: string;
  /** Absolute path of the defining file */
  file: string;
  /** Project-relative path of the defining file */
  relativePath: string;
}

/**
 * A reference that crosses a pack boundary it should not.
 */
export interface Violation {
  identifier: ViolationIdentifier;
  location: Range;
  message: string;
}

export interface CheckResult {
  /** Every violation found */
  violations: Violation[];
  /** Violations to report: all of them, or those not yet recorded */
  reported: Violation[];
  summary: {
    filesChecked: number;
    referencesAnalyzed: number;
    violationCount: number;
  };
}
