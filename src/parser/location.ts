/**
 * Offset to row/column mapping.
 *
 * Offsets are UTF-16 code units, which is what the Node tree-sitter binding
 * reports for JavaScript strings, so columns count the same units.
 */
import type { Location, Range } from './types.js';

export interface Position {
  row: number;
  col: number;
}

export interface LocationMapper {
  /** 1-based row and column of `offset`. */
  locate(offset: number): Position;
}

/**
 * Build a mapper over `text`. Line starts are computed once; each lookup is
 * a binary search.
 */
export function createLocationMapper(text: string): LocationMapper {
  const lineStarts: number[] = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      lineStarts.push(i + 1);
    }
  }

  return {
    locate(offset: number): Position {
      const clamped = Math.min(Math.max(offset, 0), text.length);
      let low = 0;
      let high = lineStarts.length - 1;
      while (low < high) {
        const mid = (low + high + 1) >> 1;
        if (lineStarts[mid] <= clamped) {
          low = mid;
        } else {
          high = mid - 1;
        }
      }
      return { row: low + 1, col: clamped - lineStarts[low] + 1 };
    },
  };
}

/**
 * Convert a raw offset pair into a 1-based range.
 */
export function toRange(mapper: LocationMapper, location: Location): Range {
  const start = mapper.locate(location.begin);
  const end = mapper.locate(location.end);
  return {
    startRow: start.row,
    startCol: start.col,
    endRow: end.row,
    endCol: end.col,
  };
}
