/**
 * Tests for check report formatters.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter, JsonFormatter, NO_VIOLATIONS_MESSAGE } from '../../../../src/cli/formatters/index.js';
import type { CheckResult, Violation } from '../../../../src/core/checker/types.js';

const violation: Violation = {
  identifier: {
    violationType: 'privacy',
    file: 'packs/foo/app/services/foo.rb',
    constantName: '::Baz',
    referencingPackName: 'packs/foo',
    definingPackName: 'packs/baz',
  },
  location: { startRow: 7, startCol: 5, endRow: 7, endCol: 8 },
  message: 'privacy: packs/foo/app/services/foo.rb:7 references private constant ::Baz from packs/baz',
};

function result(reported: Violation[]): CheckResult {
  return {
    violations: reported,
    reported,
    summary: { filesChecked: 3, referencesAnalyzed: 2, violationCount: reported.length },
  };
}

describe('HumanFormatter', () => {
  const formatter = new HumanFormatter({ colors: false });

  it('should say so when nothing is reported', () => {
    expect(formatter.formatCheck(result([]))).toBe(NO_VIOLATIONS_MESSAGE);
  });

  it('should count and list reported violations', () => {
    expect(formatter.formatCheck(result([violation]))).toBe(
      '1 violation(s) detected:\n' +
        'privacy: packs/foo/app/services/foo.rb:7 references private constant ::Baz from packs/baz'
    );
  });
});

describe('JsonFormatter', () => {
  it('should describe each violation', () => {
    const output: unknown = JSON.parse(new JsonFormatter().formatCheck(result([violation])));

    expect(output).toEqual({
      passed: false,
      violations: [
        {
          type: 'privacy',
          file: 'packs/foo/app/services/foo.rb',
          line: 7,
          column: 5,
          constant: '::Baz',
          referencing_pack: 'packs/foo',
          defining_pack: 'packs/baz',
          message: violation.message,
        },
      ],
      summary: { filesChecked: 3, referencesAnalyzed: 2, violationCount: 1 },
    });
  });
});
