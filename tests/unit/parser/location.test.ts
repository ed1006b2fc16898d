/**
 * Tests for offset to row/column mapping.
 */
import { describe, it, expect } from 'vitest';
import { createLocationMapper, toRange } from '../../../src/parser/location.js';

describe('createLocationMapper', () => {
  const mapper = createLocationMapper('ab\ncde\n\nf');

  it('should map the first offset to 1:1', () => {
    expect(mapper.locate(0)).toEqual({ row: 1, col: 1 });
  });

  it('should map offsets within a line', () => {
    expect(mapper.locate(1)).toEqual({ row: 1, col: 2 });
    expect(mapper.locate(5)).toEqual({ row: 2, col: 3 });
  });

  it('should put a newline at the end of its own line', () => {
    expect(mapper.locate(2)).toEqual({ row: 1, col: 3 });
  });

  it('should map the start of a line after the newline', () => {
    expect(mapper.locate(3)).toEqual({ row: 2, col: 1 });
  });

  it('should handle empty lines', () => {
    expect(mapper.locate(7)).toEqual({ row: 3, col: 1 });
    expect(mapper.locate(8)).toEqual({ row: 4, col: 1 });
  });

  it('should clamp offsets outside the text', () => {
    expect(mapper.locate(-3)).toEqual({ row: 1, col: 1 });
    expect(mapper.locate(100)).toEqual({ row: 4, col: 2 });
  });

  it('should work on empty text', () => {
    expect(createLocationMapper('').locate(0)).toEqual({ row: 1, col: 1 });
  });
});

describe('toRange', () => {
  it('should convert both ends of a location', () => {
    const mapper = createLocationMapper('class Foo\n  Bar\nend');

    expect(toRange(mapper, { begin: 12, end: 15 })).toEqual({
      startRow: 2,
      startCol: 3,
      endRow: 2,
      endCol: 6,
    });
  });

  it('should span lines', () => {
    const mapper = createLocationMapper('class Foo\nend');

    expect(toRange(mapper, { begin: 0, end: 13 })).toEqual({
      startRow: 1,
      startCol: 1,
      endRow: 2,
      endCol: 4,
    });
  });
});
