import type { SyntaxNode } from '@lezer/common';
import type { ParsedModule } from '../boundaries/python-parser';
import { isCamelCase, isSnakeCase } from './naming';
import { createIssue, IssueCode, type Issue, type LineIssueIndex } from './types';
import {
  Node,
  Token,
  childrenOf,
  descendantsOf,
  firstChildNamed,
  splitCommaList,
} from './syntax';

export type ParameterKind = 'positional-only' | 'positional' | 'vararg' | 'keyword-only' | 'kwarg';

export interface Parameter {
  name: string;
  kind: ParameterKind;
  defaultValue?: SyntaxNode;
}

export interface ClassDeclaration {
  kind: 'class';
  name: string;
  line: number;
}

export interface CallableDeclaration {
  kind: 'callable';
  name: string;
  line: number;
  parameters: Parameter[];
  node: SyntaxNode;
}

export type Declaration = ClassDeclaration | CallableDeclaration;

type DeclarationReader = (node: SyntaxNode, module: ParsedModule) => Declaration | undefined;

const MUTABLE_DISPLAYS = new Set<string>([Node.DICTIONARY, Node.ARRAY, Node.SET]);

const UNPACKING_TARGETS = new Set<string>([Node.TUPLE, Node.PARENTHESIZED, Node.ARRAY]);

export function readParameters(paramList: SyntaxNode, module: ParsedModule): Parameter[] {
  const parameters: Parameter[] = [];
  let kind: ParameterKind = 'positional';

  for (const segment of splitCommaList(paramList, module)) {
    if (segment.text === '/') {
      for (const parameter of parameters) {
        if (parameter.kind === 'positional') parameter.kind = 'positional-only';
      }
      continue;
    }

    const nameNode = segment.nodes.find((node) => node.name === Node.VARIABLE_NAME);
    if (segment.text.startsWith('**')) {
      if (nameNode) parameters.push({ name: module.textOf(nameNode), kind: 'kwarg' });
      continue;
    }
    if (segment.text.startsWith('*')) {
      if (nameNode) parameters.push({ name: module.textOf(nameNode), kind: 'vararg' });
      kind = 'keyword-only';
      continue;
    }
    if (!nameNode) continue;

    const parameter: Parameter = { name: module.textOf(nameNode), kind };
    const assignAt = segment.nodes.findIndex((node) => node.name === Node.ASSIGN_OP);
    const defaultValue = assignAt === -1 ? undefined : segment.nodes[assignAt + 1];
    if (defaultValue) parameter.defaultValue = defaultValue;
    parameters.push(parameter);
  }

  return parameters;
}

const DECLARATION_READERS: Readonly<Record<string, DeclarationReader>> = {
  [Node.CLASS]: (node, module) => {
    const nameNode = firstChildNamed(node, Node.VARIABLE_NAME);
    if (!nameNode) return undefined;
    return { kind: 'class', name: module.textOf(nameNode), line: module.lineAt(nameNode.from) };
  },
  [Node.FUNCTION]: (node, module) => {
    const nameNode = firstChildNamed(node, Node.VARIABLE_NAME);
    if (!nameNode) return undefined;
    const paramList = firstChildNamed(node, Node.PARAM_LIST);
    return {
      kind: 'callable',
      name: module.textOf(nameNode),
      // the `def` line; decorators sit outside the definition node
      line: module.lineAt(nameNode.from),
      parameters: paramList ? readParameters(paramList, module) : [],
      node,
    };
  },
};

export function readDeclaration(node: SyntaxNode, module: ParsedModule): Declaration | undefined {
  const reader = Object.hasOwn(DECLARATION_READERS, node.name)
    ? DECLARATION_READERS[node.name]
    : undefined;
  return reader ? reader(node, module) : undefined;
}

function unwrapParentheses(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.name === Node.PARENTHESIZED) {
    const inner = childrenOf(current).filter(
      (child) => child.name !== Token.OPEN_PAREN && child.name !== Token.CLOSE_PAREN
    );
    const only = inner.length === 1 ? inner[0] : undefined;
    if (!only) break;
    current = only;
  }
  return current;
}

export function isMutableDisplay(node: SyntaxNode): boolean {
  return MUTABLE_DISPLAYS.has(unwrapParentheses(node).name);
}

function targetNames(node: SyntaxNode): SyntaxNode[] {
  if (node.name === Node.VARIABLE_NAME) return [node];
  if (UNPACKING_TARGETS.has(node.name)) {
    return childrenOf(node).flatMap(targetNames);
  }
  return [];
}

function beforeAnnotation(nodes: SyntaxNode[]): SyntaxNode[] {
  const at = nodes.findIndex((node) => node.name === Node.TYPE_DEF || node.name === Token.COLON);
  return at === -1 ? nodes : nodes.slice(0, at);
}

function assignmentTargets(statement: SyntaxNode): SyntaxNode[] {
  const segments: SyntaxNode[][] = [[]];
  for (const child of childrenOf(statement)) {
    if (child.name === Node.ASSIGN_OP) {
      segments.push([]);
    } else {
      segments[segments.length - 1]?.push(child);
    }
  }
  if (segments.length > 1) {
    // everything before the last `=` is a target; the rest is the value
    return segments.slice(0, -1).flatMap(beforeAnnotation);
  }
  // `x: int` binds a target without a value
  const only = segments[0] ?? [];
  const kept = beforeAnnotation(only);
  return kept.length === only.length ? [] : kept;
}

function loopTargets(node: SyntaxNode): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  let inTarget = false;
  for (const child of childrenOf(node)) {
    if (child.name === Token.FOR) {
      inTarget = true;
    } else if (child.name === Token.IN) {
      inTarget = false;
    } else if (inTarget) {
      out.push(child);
    }
  }
  return out;
}

function withTargets(statement: SyntaxNode): SyntaxNode[] {
  const children = childrenOf(statement);
  const out: SyntaxNode[] = [];
  children.forEach((child, i) => {
    const next = children[i + 1];
    if (child.name === Token.AS && next) out.push(next);
  });
  return out;
}

/*
 * Names bound (store context) directly by one node: assignment, augmented
 * assignment, for/comprehension, with-as and `:=` targets.
 */
export function storedNames(node: SyntaxNode): SyntaxNode[] {
  let targets: SyntaxNode[];
  switch (node.name) {
    case Node.ASSIGN:
      targets = assignmentTargets(node);
      break;
    case Node.UPDATE: {
      const children = childrenOf(node);
      const op = children.findIndex((child) => child.name === Node.UPDATE_OP);
      targets = op === -1 ? [] : children.slice(0, op);
      break;
    }
    case Node.WITH:
      targets = withTargets(node);
      break;
    case Node.NAMED_EXPRESSION: {
      const first = childrenOf(node)[0];
      targets = first ? [first] : [];
      break;
    }
    default:
      targets = firstChildNamed(node, Token.FOR) ? loopTargets(node) : [];
  }
  return targets.flatMap(targetNames);
}

/**
 * Walks a parsed module once, pre-order, and records naming and
 * mutable-default issues by line. Only class and callable declarations have
 * checks; every other node kind just recurses into its children.
 */
export class TreeChecker {
  private index = new Map<number, Issue[]>();

  constructor(private readonly module: ParsedModule) {}

  check(): LineIssueIndex {
    this.index = new Map();
    const stack: SyntaxNode[] = [this.module.tree.topNode];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      this.visit(node);
      stack.push(...childrenOf(node).reverse());
    }
    return this.index;
  }

  private visit(node: SyntaxNode): void {
    const declaration = readDeclaration(node, this.module);
    if (!declaration) return;
    switch (declaration.kind) {
      case 'class':
        this.checkClass(declaration);
        break;
      case 'callable':
        this.checkCallable(declaration);
        break;
    }
  }

  private checkClass(declaration: ClassDeclaration): void {
    if (!isCamelCase(declaration.name)) {
      this.add(
        declaration.line,
        createIssue(IssueCode.ClassName, `Class name ${declaration.name} should use CamelCase`)
      );
    }
  }

  private checkCallable(declaration: CallableDeclaration): void {
    const { line, name, parameters } = declaration;

    if (!isSnakeCase(name)) {
      this.add(line, createIssue(IssueCode.FunctionName, `Function name ${name} should use snake_case`));
    }

    for (const parameter of parameters) {
      if (parameter.kind !== 'positional') continue;
      if (!isSnakeCase(parameter.name)) {
        this.add(
          line,
          createIssue(IssueCode.ArgumentName, `Argument name ${parameter.name} should be snake_case`)
        );
      }
    }

    // Document order, whatever the nesting of the binding construct.
    const targets = descendantsOf(declaration.node)
      .flatMap((node) => storedNames(node))
      .sort((a, b) => a.from - b.from);
    for (const target of targets) {
      const variable = this.module.textOf(target);
      if (!isSnakeCase(variable)) {
        this.add(
          this.module.lineAt(target.from),
          createIssue(IssueCode.VariableName, `Variable ${variable} should be snake_case`)
        );
      }
    }

    const hasMutableDefault = parameters.some(
      (parameter) =>
        (parameter.kind === 'positional' || parameter.kind === 'positional-only') &&
        parameter.defaultValue !== undefined &&
        isMutableDisplay(parameter.defaultValue)
    );
    if (hasMutableDefault) {
      this.add(line, createIssue(IssueCode.MutableDefault, 'The default argument value is mutable'));
    }
  }

  private add(line: number, issue: Issue): void {
    const issues = this.index.get(line);
    if (issues) {
      issues.push(issue);
    } else {
      this.index.set(line, [issue]);
    }
  }
}

export function checkTree(module: ParsedModule): LineIssueIndex {
  return new TreeChecker(module).check();
}
