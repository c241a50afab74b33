import { createIssue, IssueCode, type Issue } from './types';
import type { SourceLine } from './source-line';

export const MAX_LINE_LENGTH = 79;
export const INDENT_UNIT = 4;
export const MAX_BLANK_LINES = 2;

const DECLARATION = /(def|class)\s+([\p{L}\p{N}_]+)/u;

type LineCheck = (line: SourceLine) => Issue | undefined;

function tooLong(line: SourceLine): Issue | undefined {
  if (line.length > MAX_LINE_LENGTH) {
    return createIssue(IssueCode.TooLong, 'Too long');
  }
  return undefined;
}

function badIndentation(line: SourceLine): Issue | undefined {
  if (line.indentationWidth % INDENT_UNIT !== 0) {
    return createIssue(IssueCode.Indentation, 'Indentation is not a multiple of four');
  }
  return undefined;
}

function trailingSemicolon(line: SourceLine): Issue | undefined {
  if (line.codeSegment.trimEnd().endsWith(';')) {
    return createIssue(IssueCode.Semicolon, 'Unnecessary semicolon');
  }
  return undefined;
}

function inlineCommentSpacing(line: SourceLine): Issue | undefined {
  if (line.codeSegment && line.commentSegment && line.interSegmentGap < 2) {
    return createIssue(
      IssueCode.InlineCommentSpacing,
      'At least two spaces required before inline comments'
    );
  }
  return undefined;
}

function todoComment(line: SourceLine): Issue | undefined {
  if (line.commentSegment.toUpperCase().includes('TODO')) {
    return createIssue(IssueCode.Todo, 'TODO found');
  }
  return undefined;
}

function tooManyBlankLines(line: SourceLine): Issue | undefined {
  if (line.precedingBlankCount > MAX_BLANK_LINES) {
    return createIssue(IssueCode.BlankLines, 'More than two blank lines used before this line');
  }
  return undefined;
}

// Only the first def/class construct on the line is inspected.
function declarationSpacing(line: SourceLine): Issue | undefined {
  const match = DECLARATION.exec(line.codeSegment);
  if (!match || !match[1] || !match[2]) return undefined;
  const keyword = match[1];
  const spaces = match[0].length - keyword.length - match[2].length;
  if (spaces > 1) {
    return createIssue(IssueCode.DeclarationSpacing, `Too many spaces after ${keyword}`);
  }
  return undefined;
}

const LINE_CHECKS: readonly LineCheck[] = [
  tooLong,
  badIndentation,
  trailingSemicolon,
  inlineCommentSpacing,
  todoComment,
  tooManyBlankLines,
  declarationSpacing,
];

/**
 * Runs every lexical check against one non-blank line, in fixed order.
 * Blank lines are the caller's concern: they only feed the blank-line counter.
 */
export function checkLine(line: SourceLine): Issue[] {
  const issues: Issue[] = [];
  for (const check of LINE_CHECKS) {
    const issue = check(line);
    if (issue) issues.push(issue);
  }
  return issues;
}
