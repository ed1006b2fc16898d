/**
 * Human-readable check report.
 */
import chalk from 'chalk';
import type { CheckResult } from '../../core/checker/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export const NO_VIOLATIONS_MESSAGE = 'No violations detected!';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  /**
   * `N violation(s) detected:` and one message per line, or
   * {@link NO_VIOLATIONS_MESSAGE}.
   */
  formatCheck(result: CheckResult): string {
    const violations = result.reported;
    if (violations.length === 0) {
      return this.colorize(NO_VIOLATIONS_MESSAGE, 'green');
    }
    return [
      this.colorize(`${violations.length} violation(s) detected:`, 'red'),
      ...violations.map((violation) => violation.message),
    ].join('\n');
  }

  private colorize(text: string, color: 'red' | 'green'): string {
    if (!this.options.colors) {
      return text;
    }
    return color === 'red' ? chalk.red(text) : chalk.green(text);
  }
}
