import { describe, it, expect } from 'vitest';
import { RULES, RuleKind, getRule } from '../src/rules/catalog';
import { IssueCode } from '../src/analyzer/types';

describe('rule catalog', () => {
  it('lists every issue code once, in code order', () => {
    expect(RULES.map((rule) => rule.code)).toEqual(Object.values(IssueCode));
  });

  it('marks S001-S007 lexical and S008-S012 tree', () => {
    expect(RULES.filter((rule) => rule.kind === RuleKind.LEXICAL)).toHaveLength(7);
    expect(RULES.filter((rule) => rule.kind === RuleKind.TREE)).toHaveLength(5);
  });

  it('looks rules up by code', () => {
    expect(getRule(IssueCode.TooLong).slug).toBe('too-long-line');
    expect(getRule(IssueCode.VariableName).slug).toBe('variable-name-snake-case');
  });
});
