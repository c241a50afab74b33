/*
 * First '#' that is not directly preceded by a quote character.
 * This is a lookbehind heuristic, not string-literal parsing: `"a#b"` still
 * splits at the '#', and multi-line strings are not tracked.
 */
const COMMENT_START = /(?<!')(?<!")#/;

const LEADING_SPACES = /^ */;

export interface LineSegments {
  code: string;
  comment: string;
  gap: number;
}

/**
 * Splits a line into the code before an inline comment and the comment itself.
 * `gap` is the number of characters between the two; without a comment it is
 * the count of trailing whitespace characters.
 */
export function splitCodeAndComment(text: string): LineSegments {
  const match = COMMENT_START.exec(text);
  const commentStart = match ? match.index : text.length;
  const comment = text.slice(commentStart);
  const code = text.slice(0, commentStart).trimEnd();
  return { code, comment, gap: commentStart - code.length };
}

export function countIndentation(text: string): number {
  const match = LEADING_SPACES.exec(text);
  return match ? match[0].length : 0;
}

/**
 * A physical line of source with the facts the lexical checks need,
 * computed once at construction.
 */
export class SourceLine {
  readonly length: number;
  readonly indentationWidth: number;
  readonly codeSegment: string;
  readonly commentSegment: string;
  readonly interSegmentGap: number;

  constructor(
    readonly rawText: string,
    readonly index: number = 1,
    readonly precedingBlankCount: number = 0
  ) {
    // code points, not UTF-16 units
    this.length = Array.from(rawText).length;
    this.indentationWidth = countIndentation(rawText);
    const { code, comment, gap } = splitCodeAndComment(rawText);
    this.codeSegment = code;
    this.commentSegment = comment;
    this.interSegmentGap = gap;
  }

  get isBlank(): boolean {
    return this.rawText === '';
  }
}
