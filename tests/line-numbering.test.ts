import { describe, it, expect } from 'vitest';
import {
  buildLineStarts,
  lineAtOffset,
  normalizeSource,
  splitLines,
} from '../src/analyzer/line-numbering';

describe('line numbering', () => {
  it('normalizes CRLF and CR line endings and drops a BOM', () => {
    expect(normalizeSource('\uFEFFa\r\nb\rc\n')).toBe('a\nb\nc\n');
  });

  it('does not create a line for the trailing newline', () => {
    expect(splitLines('a\n\nb\n')).toEqual(['a', '', 'b']);
    expect(splitLines('a')).toEqual(['a']);
    expect(splitLines('')).toEqual([]);
  });

  it('finds the 1-based line of an offset', () => {
    const starts = buildLineStarts('ab\ncd\n\nef');
    expect(starts).toEqual([0, 3, 6, 7]);
    expect(lineAtOffset(starts, 0)).toBe(1);
    expect(lineAtOffset(starts, 2)).toBe(1);
    expect(lineAtOffset(starts, 3)).toBe(2);
    expect(lineAtOffset(starts, 6)).toBe(3);
    expect(lineAtOffset(starts, 8)).toBe(4);
  });
});
