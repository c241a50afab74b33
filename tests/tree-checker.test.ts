import { describe, it, expect } from 'vitest';
import { parsePython } from '../src/boundaries/python-parser';
import { checkTree } from '../src/analyzer/tree-checker';
import { IssueCode } from '../src/analyzer/types';

function source(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

/*
 * Flattens the index into `line:code` entries in line order.
 */
function findings(text: string): string[] {
  const index = checkTree(parsePython(text));
  return Array.from(index.entries())
    .sort(([a], [b]) => a - b)
    .flatMap(([line, issues]) => issues.map((issue) => `${line}:${issue.code}`));
}

describe('TreeChecker', () => {
  describe('class names', () => {
    it('reports a class name that is not CamelCase', () => {
      const index = checkTree(parsePython(source('class my_class:', '    pass')));
      expect(index.get(1)).toEqual([
        { code: IssueCode.ClassName, message: 'Class name my_class should use CamelCase' },
      ]);
    });

    it('accepts a CamelCase class name', () => {
      expect(findings(source('class Shape:', '    pass'))).toEqual([]);
    });
  });

  describe('function names', () => {
    it('reports a function name that is not snake_case', () => {
      const index = checkTree(parsePython(source('def MyFunc():', '    pass')));
      expect(index.get(1)).toEqual([
        { code: IssueCode.FunctionName, message: 'Function name MyFunc should use snake_case' },
      ]);
    });

    it('checks methods and async functions', () => {
      const text = source(
        'class Shape:',
        '    def Area(self):',
        '        pass',
        '',
        'async def FetchAll():',
        '    pass'
      );
      expect(findings(text)).toEqual(['2:S009', '5:S009']);
    });

    it('records the def line, not the decorator line', () => {
      const text = source('@staticmethod', 'def Build():', '    pass');
      expect(findings(text)).toEqual(['2:S009']);
    });
  });

  describe('argument names', () => {
    it('reports positional parameters on the declaration line', () => {
      const index = checkTree(parsePython(source('def area(Width, height):', '    pass')));
      expect(index.get(1)).toEqual([
        { code: IssueCode.ArgumentName, message: 'Argument name Width should be snake_case' },
      ]);
    });

    it('reports every offending positional parameter in order', () => {
      const text = source('def area(Width, Height=1):', '    pass');
      const index = checkTree(parsePython(text));
      expect(index.get(1)?.map((issue) => issue.message)).toEqual([
        'Argument name Width should be snake_case',
        'Argument name Height should be snake_case',
      ]);
    });

    it('does not check keyword-only, *args or **kwargs parameters', () => {
      const text = source('def call(value, *Args, Flag=None, **Options):', '    pass');
      expect(findings(text)).toEqual([]);
    });

    it('does not check parameters after a bare star', () => {
      expect(findings(source('def call(*, Flag):', '    pass'))).toEqual([]);
    });
  });

  describe('variable names', () => {
    it('reports an assignment inside a function on its own line', () => {
      const text = source('def compute():', '    My_Var = 1', '    return My_Var');
      const index = checkTree(parsePython(text));
      expect(index.get(1)).toBeUndefined();
      expect(index.get(2)).toEqual([
        { code: IssueCode.VariableName, message: 'Variable My_Var should be snake_case' },
      ]);
    });

    it('ignores module-level assignments', () => {
      expect(findings(source('My_Var = 1'))).toEqual([]);
    });

    it('covers unpacking, augmented, annotated and loop targets', () => {
      const text = source(
        'def compute(items):',
        '    First, Second = 1, 2',
        '    Total: int = 0',
        '    Total += 1',
        '    for Item in items:',
        '        pass',
        '    return First'
      );
      expect(findings(text)).toEqual(['2:S011', '2:S011', '3:S011', '4:S011', '5:S011']);
    });

    it('ignores attribute and subscript targets', () => {
      const text = source('def update(obj, table):', '    obj.Value = 1', '    table[0] = 2');
      expect(findings(text)).toEqual([]);
    });

    it('reports names on one line in document order', () => {
      const text = source(
        'def build(v, w):',
        '    y = [Z := v for V in w]',
        '    (A, B), C = 1, 2, 3'
      );
      const index = checkTree(parsePython(text));
      expect(index.get(2)?.map((issue) => issue.message)).toEqual([
        'Variable Z should be snake_case',
        'Variable V should be snake_case',
      ]);
      expect(index.get(3)?.map((issue) => issue.message)).toEqual([
        'Variable A should be snake_case',
        'Variable B should be snake_case',
        'Variable C should be snake_case',
      ]);
    });

    it('reports a nested function assignment once per enclosing function', () => {
      const text = source(
        'def outer():',
        '    def inner():',
        '        Bad = 1',
        '    return inner'
      );
      expect(findings(text)).toEqual(['3:S011', '3:S011']);
    });
  });

  describe('mutable defaults', () => {
    it('reports a dict default once on the declaration line', () => {
      const index = checkTree(parsePython(source('def f(x={}):', '    return x')));
      expect(index.get(1)).toEqual([
        { code: IssueCode.MutableDefault, message: 'The default argument value is mutable' },
      ]);
    });

    it('reports once for several mutable defaults', () => {
      const text = source('def f(a=[], b={}, c={1}):', '    pass');
      expect(findings(text)).toEqual(['1:S012']);
    });

    it('looks through parentheses', () => {
      expect(findings(source('def f(a=([])):', '    pass'))).toEqual(['1:S012']);
    });

    it('does not treat calls, comprehensions or tuples as displays', () => {
      const text = source('def f(a=list(), b=[i for i in range(3)], c=()):', '    pass');
      expect(findings(text)).toEqual([]);
    });

    it('ignores keyword-only defaults', () => {
      expect(findings(source('def f(*, a=[]):', '    pass'))).toEqual([]);
    });
  });

  it('orders a callable as name, arguments, variables, then mutable default', () => {
    const text = source('def Build(Size=[]):', '    Result = Size', '    return Result');
    const index = checkTree(parsePython(text));
    expect(index.get(1)?.map((issue) => issue.code)).toEqual([
      IssueCode.FunctionName,
      IssueCode.ArgumentName,
      IssueCode.MutableDefault,
    ]);
    expect(index.get(2)?.map((issue) => issue.code)).toEqual([IssueCode.VariableName]);
  });
});
