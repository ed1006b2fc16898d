/**
 * JSON check report for machine consumption.
 */
import type { CheckResult } from '../../core/checker/types.js';
import type { IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatCheck(result: CheckResult): string {
    return JSON.stringify(
      {
        passed: result.reported.length === 0,
        violations: result.reported.map((violation) => ({
          type: violation.identifier.violationType,
          file: violation.identifier.file,
          line: violation.location.startRow,
          column: violation.location.startCol,
          constant: violation.identifier.constantName,
          referencing_pack: violation.identifier.referencingPackName,
          defining_pack: violation.identifier.definingPackName,
          message: violation.message,
        })),
        summary: result.summary,
      },
      null,
      2
    );
  }
}
