/**
 * Stable issue codes. Lexical codes come from single lines of text,
 * tree codes from the parsed module.
 */
export enum IssueCode {
  TooLong = 'S001',
  Indentation = 'S002',
  Semicolon = 'S003',
  InlineCommentSpacing = 'S004',
  Todo = 'S005',
  BlankLines = 'S006',
  DeclarationSpacing = 'S007',
  ClassName = 'S008',
  FunctionName = 'S009',
  ArgumentName = 'S010',
  VariableName = 'S011',
  MutableDefault = 'S012',
}

export interface Issue {
  readonly code: IssueCode;
  readonly message: string;
}

/*
 * Line number -> tree issues found on that line, in walk order.
 */
export type LineIssueIndex = ReadonlyMap<number, readonly Issue[]>;

export interface Diagnostic {
  file: string;
  line: number;
  issue: Issue;
}

export interface FileReport {
  file: string;
  diagnostics: Diagnostic[];
}

export function createIssue(code: IssueCode, message: string): Issue {
  return Object.freeze({ code, message });
}
