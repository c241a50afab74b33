import { parser } from '@lezer/python';
import type { SyntaxNode, Tree } from '@lezer/common';
import { ProcessingError, handleUnknownError } from '../errors/index';
import { buildLineStarts, lineAtOffset } from '../analyzer/line-numbering';
import { validatePythonSyntax } from './python-grammar';

/*
 * A successfully parsed module. Positions in the tree are offsets into `text`.
 */
export interface ParsedModule {
  readonly text: string;
  readonly tree: Tree;
  lineAt(offset: number): number;
  textOf(node: SyntaxNode): string;
}

/**
 * Parses normalized Python source. Syntax is checked by our own grammar first
 * and a ParseError carries its position. The lezer tree only feeds the checks;
 * its recovery nodes around constructs it lacks are not treated as errors.
 */
export function parsePython(text: string): ParsedModule {
  validatePythonSyntax(text);

  let tree: Tree;
  try {
    tree = parser.parse(text);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Python parsing');
    throw new ProcessingError(`Failed to parse Python source: ${err.message}`);
  }

  const starts = buildLineStarts(text);
  const lineAt = (offset: number): number => lineAtOffset(starts, offset);

  return {
    text,
    tree,
    lineAt,
    textOf: (node) => text.slice(node.from, node.to),
  };
}
