/**
 * Utilities for mapping between source offsets and 1-based line numbers.
 */

/**
 * Normalizes CRLF and lone CR line endings to LF and drops a leading BOM.
 */
export function normalizeSource(text: string): string {
  const withoutBom = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  return withoutBom.replace(/\r\n?/g, '\n');
}

/**
 * Splits normalized text into physical lines without their newline.
 * A trailing newline does not produce an extra empty line, and empty text has no lines.
 *
 * @param text - Normalized source text
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (text.endsWith('\n')) lines.pop();
  return lines;
}

/**
 * Offsets (0-indexed) at which each line starts.
 */
export function buildLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/**
 * Gets the 1-indexed line containing an offset.
 *
 * @param starts - Result of buildLineStarts for the same text
 * @param offset - 0-indexed character offset
 */
export function lineAtOffset(starts: readonly number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    const start = starts[mid] ?? 0;
    if (start <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}
