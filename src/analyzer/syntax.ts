import type { SyntaxNode } from '@lezer/common';
import type { ParsedModule } from '../boundaries/python-parser';

/**
 * Node names produced by the Python grammar that the tree checks care about.
 */
export const Node = {
  CLASS: 'ClassDefinition',
  FUNCTION: 'FunctionDefinition',
  PARAM_LIST: 'ParamList',
  VARIABLE_NAME: 'VariableName',
  ASSIGN: 'AssignStatement',
  UPDATE: 'UpdateStatement',
  WITH: 'WithStatement',
  NAMED_EXPRESSION: 'NamedExpression',
  ASSIGN_OP: 'AssignOp',
  UPDATE_OP: 'UpdateOp',
  TYPE_DEF: 'TypeDef',
  DICTIONARY: 'DictionaryExpression',
  ARRAY: 'ArrayExpression',
  SET: 'SetExpression',
  TUPLE: 'TupleExpression',
  PARENTHESIZED: 'ParenthesizedExpression',
  COMMENT: 'Comment',
} as const;

export const Token = {
  COMMA: ',',
  COLON: ':',
  OPEN_PAREN: '(',
  CLOSE_PAREN: ')',
  FOR: 'for',
  IN: 'in',
  AS: 'as',
} as const;

/**
 * Direct children of a node in source order, comments excluded.
 */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.name !== Node.COMMENT) children.push(child);
  }
  return children;
}

export function firstChildNamed(node: SyntaxNode, name: string): SyntaxNode | undefined {
  return childrenOf(node).find((child) => child.name === name);
}

/**
 * All nodes below `node` (not `node` itself) in pre-order.
 */
export function descendantsOf(node: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  const stack = childrenOf(node).reverse();
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    out.push(current);
    stack.push(...childrenOf(current).reverse());
  }
  return out;
}

export interface Segment {
  nodes: SyntaxNode[];
  /** Source text of the segment with comments and surrounding whitespace removed. */
  text: string;
}

/**
 * Splits a bracketed list (parameters, arguments) into its comma-separated
 * entries. Entries are also described by their text so that punctuation the
 * grammar leaves out of the tree (such as a bare `/`) is still visible.
 */
export function splitCommaList(node: SyntaxNode, module: ParsedModule): Segment[] {
  const segments: Segment[] = [];
  let nodes: SyntaxNode[] = [];
  let from = module.text.startsWith('(', node.from) ? node.from + 1 : node.from;
  const end = module.text.endsWith(')', node.to) ? node.to - 1 : node.to;
  const comments: Array<{ from: number; to: number }> = [];

  const close = (to: number): void => {
    let text = '';
    let cursor = from;
    for (const comment of comments) {
      if (comment.from < cursor || comment.to > to) continue;
      text += module.text.slice(cursor, comment.from);
      cursor = comment.to;
    }
    text += module.text.slice(cursor, to);
    segments.push({ nodes, text: text.trim() });
    nodes = [];
  };

  let lastEnd = from;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    // commas the grammar does not keep as nodes
    const gap = module.text.slice(lastEnd, child.from);
    for (let comma = gap.indexOf(','); comma !== -1; comma = gap.indexOf(',', comma + 1)) {
      close(lastEnd + comma);
      from = lastEnd + comma + 1;
    }
    lastEnd = child.to;

    switch (child.name) {
      case Node.COMMENT:
        comments.push({ from: child.from, to: child.to });
        break;
      case Token.OPEN_PAREN:
        from = child.to;
        break;
      case Token.COMMA:
      case Token.CLOSE_PAREN:
        close(child.from);
        from = child.to;
        break;
      default:
        nodes.push(child);
    }
  }
  const tail = module.text.slice(lastEnd, end);
  for (let comma = tail.indexOf(','); comma !== -1; comma = tail.indexOf(',', comma + 1)) {
    close(lastEnd + comma);
    from = lastEnd + comma + 1;
  }
  if (nodes.length > 0 || module.text.slice(from, end).trim() !== '') close(end);

  return segments.filter((segment) => segment.text !== '');
}
