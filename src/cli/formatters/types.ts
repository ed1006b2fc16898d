/**
 * Formatter type definitions.
 */
import type { CheckResult } from '../../core/checker/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for check report formatters.
 */
export interface IFormatter {
  formatCheck(result: CheckResult): string;
}
