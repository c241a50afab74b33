import { IssueCode } from '../analyzer/types';

export const RuleKind = {
  LEXICAL: 'lexical',
  TREE: 'tree',
} as const;

export type RuleKindName = typeof RuleKind[keyof typeof RuleKind];

export interface RuleInfo {
  code: IssueCode;
  slug: string;
  kind: RuleKindName;
  description: string;
}

export const RULES: readonly RuleInfo[] = [
  {
    code: IssueCode.TooLong,
    slug: 'too-long-line',
    kind: RuleKind.LEXICAL,
    description: 'Line is longer than 79 characters',
  },
  {
    code: IssueCode.Indentation,
    slug: 'indentation-not-multiple-of-four',
    kind: RuleKind.LEXICAL,
    description: 'Leading spaces are not a multiple of four',
  },
  {
    code: IssueCode.Semicolon,
    slug: 'unnecessary-semicolon',
    kind: RuleKind.LEXICAL,
    description: 'Code before any comment ends with a semicolon',
  },
  {
    code: IssueCode.InlineCommentSpacing,
    slug: 'inline-comment-spacing',
    kind: RuleKind.LEXICAL,
    description: 'Fewer than two spaces between code and an inline comment',
  },
  {
    code: IssueCode.Todo,
    slug: 'todo-comment',
    kind: RuleKind.LEXICAL,
    description: 'Comment contains TODO (any case)',
  },
  {
    code: IssueCode.BlankLines,
    slug: 'too-many-blank-lines',
    kind: RuleKind.LEXICAL,
    description: 'More than two blank lines before this line',
  },
  {
    code: IssueCode.DeclarationSpacing,
    slug: 'declaration-keyword-spacing',
    kind: RuleKind.LEXICAL,
    description: "More than one space after 'def' or 'class'",
  },
  {
    code: IssueCode.ClassName,
    slug: 'class-name-camel-case',
    kind: RuleKind.TREE,
    description: 'Class name does not start CamelCase',
  },
  {
    code: IssueCode.FunctionName,
    slug: 'function-name-snake-case',
    kind: RuleKind.TREE,
    description: 'Function or method name does not start snake_case',
  },
  {
    code: IssueCode.ArgumentName,
    slug: 'argument-name-snake-case',
    kind: RuleKind.TREE,
    description: 'Positional parameter name does not start snake_case',
  },
  {
    code: IssueCode.VariableName,
    slug: 'variable-name-snake-case',
    kind: RuleKind.TREE,
    description: 'Name assigned inside a function does not start snake_case',
  },
  {
    code: IssueCode.MutableDefault,
    slug: 'mutable-default-argument',
    kind: RuleKind.TREE,
    description: 'A positional default is a dict, list or set display',
  },
];

const BY_CODE = new Map<IssueCode, RuleInfo>(RULES.map((rule) => [rule.code, rule]));

export function getRule(code: IssueCode): RuleInfo {
  const rule = BY_CODE.get(code);
  if (!rule) {
    throw new Error(`Unknown issue code: '${code}'`);
  }
  return rule;
}
