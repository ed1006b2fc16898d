/**
 * String helpers for Ruby naming conventions.
 */

/**
 * Zeitwerk-style camelization of a file or directory basename:
 * `bar_baz` becomes `BarBaz`.
 */
export function camelize(segment: string): string {
  return segment
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

