import { ParseError } from '../errors/index';

export enum TokenKind {
  Name = 'name',
  Number = 'number',
  String = 'string',
  Op = 'op',
  Newline = 'newline',
  Indent = 'indent',
  Dedent = 'dedent',
  End = 'end',
}

export interface PyToken {
  kind: TokenKind;
  text: string;
  line: number;
  column: number;
}

export function syntaxError(reason: string, line: number, column: number): ParseError {
  return new ParseError(`${reason} at line ${line}, column ${column}`, line, column);
}

// Longest first, so `**=` wins over `**` and `*`.
const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '!=', '%=', '&=', '**', '*=', '+=', '-=', '->', '//', '/=', ':=', '<<', '<=', '==', '>=', '>>', '@=', '^=', '|=',
  '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=', '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
];

const CLOSERS: Readonly<Record<string, string>> = { ')': '(', ']': '[', '}': '{' };

const STRING_START = /(?:[rR][bBfF]?|[bBfF][rR]?|[uU])?('''|"""|'|")/y;
const NAME = /[\p{XID_Start}_][\p{XID_Continue}]*/uy;
const NUMBER =
  /0[xX](?:_?[0-9a-fA-F])+|0[bB](?:_?[01])+|0[oO](?:_?[0-7])+|(?:(?:\d(?:_?\d)*)?\.\d(?:_?\d)*|\d(?:_?\d)*\.?)(?:[eE][-+]?\d(?:_?\d)*)?[jJ]?/y;
const LEADING_ZEROS = /^0[0-9_]*[1-9][0-9_]*$/;
// Keywords that may directly follow a number, as in `1if x else 2`.
const NUMBER_SUFFIX_KEYWORDS = new Set(['and', 'else', 'for', 'if', 'in', 'is', 'not', 'or']);

interface IndentLevel {
  // tabs to the next multiple of eight
  width: number;
  // tabs as one column
  altWidth: number;
}

interface OpenBracket {
  char: string;
  line: number;
  column: number;
}

function matchAt(pattern: RegExp, text: string, pos: number): string | undefined {
  pattern.lastIndex = pos;
  const match = pattern.exec(text);
  return match ? match[0] : undefined;
}

/**
 * Splits normalized (LF-only) source into tokens the way the language's own
 * tokenizer does: INDENT/DEDENT from leading whitespace, NEWLINE only at the
 * end of logical lines, nothing emitted for blank or comment-only lines, and
 * no line structure inside brackets.
 *
 * Lexical errors (unterminated strings, unmatched brackets, indentation that
 * matches no outer level, stray characters) raise ParseError.
 */
export function tokenizePython(text: string): PyToken[] {
  const tokens: PyToken[] = [];
  const indents: IndentLevel[] = [{ width: 0, altWidth: 0 }];
  const brackets: OpenBracket[] = [];

  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let atLineStart = true;
  let continued = false;
  let lineHasTokens = false;

  const column = (at: number): number => at - lineStart + 1;
  const push = (kind: TokenKind, value: string, at: number): void => {
    tokens.push({ kind, text: value, line, column: column(at) });
  };

  while (pos < text.length) {
    if (atLineStart) {
      atLineStart = false;
      let width = 0;
      let altWidth = 0;
      while (pos < text.length) {
        const ch = text[pos];
        if (ch === ' ') {
          width += 1;
          altWidth += 1;
        } else if (ch === '\t') {
          width = (Math.floor(width / 8) + 1) * 8;
          altWidth += 1;
        } else if (ch === '\f') {
          width = 0;
          altWidth = 0;
        } else {
          break;
        }
        pos += 1;
      }
      const next = text[pos];
      const blank = next === undefined || next === '\n' || next === '#';
      if (!blank && brackets.length === 0 && !continued) {
        indent(width, altWidth, pos);
      }
      continue;
    }

    const ch = text.charAt(pos);

    if (ch === '\n') {
      if (brackets.length === 0 && lineHasTokens) {
        push(TokenKind.Newline, '\n', pos);
        lineHasTokens = false;
      }
      pos += 1;
      line += 1;
      lineStart = pos;
      atLineStart = true;
      continued = false;
      continue;
    }

    if (ch === ' ' || ch === '\t' || ch === '\f') {
      pos += 1;
      continue;
    }

    if (ch === '#') {
      const end = text.indexOf('\n', pos);
      pos = end === -1 ? text.length : end;
      continue;
    }

    if (ch === '\\') {
      if (text[pos + 1] === '\n') {
        pos += 2;
        line += 1;
        lineStart = pos;
        atLineStart = true;
        continued = true;
        continue;
      }
      if (pos + 1 >= text.length) {
        throw syntaxError('unexpected EOF while parsing', line, column(pos));
      }
      throw syntaxError('unexpected character after line continuation character', line, column(pos));
    }

    const stringStart = matchAt(STRING_START, text, pos);
    if (stringStart !== undefined) {
      pos = scanString(pos, stringStart);
      lineHasTokens = true;
      continue;
    }

    if (/\d/.test(ch) || (ch === '.' && /\d/.test(text.charAt(pos + 1)))) {
      const number = matchAt(NUMBER, text, pos) ?? ch;
      if (LEADING_ZEROS.test(number)) {
        throw syntaxError(
          'leading zeros in decimal integer literals are not permitted',
          line,
          column(pos)
        );
      }
      const following = matchAt(NAME, text, pos + number.length);
      if (following !== undefined && !NUMBER_SUFFIX_KEYWORDS.has(following)) {
        throw syntaxError('invalid decimal literal', line, column(pos));
      }
      push(TokenKind.Number, number, pos);
      pos += number.length;
      lineHasTokens = true;
      continue;
    }

    const name = matchAt(NAME, text, pos);
    if (name !== undefined) {
      push(TokenKind.Name, name, pos);
      pos += name.length;
      lineHasTokens = true;
      continue;
    }

    const op = OPERATORS.find((candidate) => text.startsWith(candidate, pos));
    if (op !== undefined) {
      bracket(op, pos);
      push(TokenKind.Op, op, pos);
      pos += op.length;
      lineHasTokens = true;
      continue;
    }

    throw syntaxError(`invalid character '${ch}'`, line, column(pos));
  }

  const unclosed = brackets[brackets.length - 1];
  if (unclosed) {
    throw syntaxError(`'${unclosed.char}' was never closed`, unclosed.line, unclosed.column);
  }
  if (lineHasTokens) {
    push(TokenKind.Newline, '', pos);
  }
  while (indents.length > 1) {
    indents.pop();
    push(TokenKind.Dedent, '', pos);
  }
  push(TokenKind.End, '', pos);
  return tokens;

  function indent(width: number, altWidth: number, at: number): void {
    const top = indents[indents.length - 1] ?? { width: 0, altWidth: 0 };
    if (width === top.width) {
      if (altWidth !== top.altWidth) {
        throw syntaxError('inconsistent use of tabs and spaces in indentation', line, column(at));
      }
      return;
    }
    if (width > top.width) {
      if (altWidth <= top.altWidth) {
        throw syntaxError('inconsistent use of tabs and spaces in indentation', line, column(at));
      }
      indents.push({ width, altWidth });
      push(TokenKind.Indent, '', at);
      return;
    }
    let current = top;
    while (indents.length > 1 && width < current.width) {
      indents.pop();
      push(TokenKind.Dedent, '', at);
      current = indents[indents.length - 1] ?? { width: 0, altWidth: 0 };
    }
    if (width !== current.width) {
      throw syntaxError('unindent does not match any outer indentation level', line, column(at));
    }
    if (altWidth !== current.altWidth) {
      throw syntaxError('inconsistent use of tabs and spaces in indentation', line, column(at));
    }
  }

  function bracket(op: string, at: number): void {
    if (op === '(' || op === '[' || op === '{') {
      brackets.push({ char: op, line, column: column(at) });
      return;
    }
    const opener = CLOSERS[op];
    if (opener === undefined) return;
    const open = brackets.pop();
    if (!open) {
      throw syntaxError(`unmatched '${op}'`, line, column(at));
    }
    if (open.char !== opener) {
      throw syntaxError(
        `closing parenthesis '${op}' does not match opening parenthesis '${open.char}'`,
        line,
        column(at)
      );
    }
  }

  /*
   * Returns the offset just past the closing quote. Line counters advance
   * across the newlines a triple-quoted string or an escaped newline spans.
   */
  function scanString(start: number, opening: string): number {
    const quote = opening.replace(/^[^'"]+/, '');
    const triple = quote.length === 3;
    const startLine = line;
    const startColumn = column(start);
    const unterminated = (): ParseError =>
      syntaxError(
        triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal',
        startLine,
        startColumn
      );

    let p = start + opening.length;
    for (;;) {
      if (p >= text.length) throw unterminated();
      const c = text[p];
      if (c === '\\') {
        if (text[p + 1] === '\n') {
          line += 1;
          lineStart = p + 2;
        }
        p += 2;
        continue;
      }
      if (c === '\n') {
        if (!triple) throw unterminated();
        line += 1;
        lineStart = p + 1;
        p += 1;
        continue;
      }
      if (text.startsWith(quote, p)) {
        p += quote.length;
        break;
      }
      p += 1;
    }
    tokens.push({ kind: TokenKind.String, text: text.slice(start, p), line: startLine, column: startColumn });
    return p;
  }
}
