import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  AnalysisState,
  FileAnalysisOrchestrator,
  analyzeFile,
  analyzeSource,
  readSource,
} from '../src/analyzer/file-analyzer';
import { FileReadError, ParseError, ProcessingError } from '../src/errors/index';
import type { FileReport } from '../src/analyzer/types';

function source(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

function summarize(report: FileReport): string[] {
  return report.diagnostics.map((d) => `${d.line}:${d.issue.code}`);
}

function writeTemp(name: string, content: string): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'pystylelint-'));
  const file = path.join(dir, name);
  writeFileSync(file, content);
  return file;
}

describe('FileAnalysisOrchestrator', () => {
  it('emits lexical issues before tree issues on the same line', () => {
    const report = analyzeSource('a.py', source('def  BadName():', '    pass'));
    expect(report.diagnostics).toEqual([
      {
        file: 'a.py',
        line: 1,
        issue: { code: 'S007', message: 'Too many spaces after def' },
      },
      {
        file: 'a.py',
        line: 1,
        issue: { code: 'S009', message: 'Function name BadName should use snake_case' },
      },
    ]);
  });

  it('reports in ascending line order', () => {
    const text = source(
      'import os;',
      'def load(Path_Name):',
      '    Result = os.sep  # todo',
      '    return Result'
    );
    expect(summarize(analyzeSource('a.py', text))).toEqual(['1:S003', '2:S010', '3:S005', '3:S011']);
  });

  it('counts blank lines and resets after each non-blank line', () => {
    const text = source('a = 1', 'b = 2', '', 'c = 3', '', '', 'd = 4', '', '', '', 'e = 5');
    expect(summarize(analyzeSource('a.py', text))).toEqual(['11:S006']);
  });

  it('treats whitespace-only lines as non-blank', () => {
    const text = source('a = 1', '', '', '    ', '', 'b = 2');
    expect(summarize(analyzeSource('a.py', text))).toEqual([]);
  });

  it('normalizes CRLF line endings', () => {
    const report = analyzeSource('a.py', 'x = 1;\r\ny = 2\r\n');
    expect(summarize(report)).toEqual(['1:S003']);
  });

  it('reports a TODO inside a multi-line string as a comment', () => {
    const text = source('"""Module notes.', '# TODO tidy', '"""');
    expect(summarize(analyzeSource('a.py', text))).toEqual(['2:S005']);
  });

  it('reports nothing for an empty file', () => {
    expect(analyzeSource('empty.py', '').diagnostics).toEqual([]);
  });

  it('rejects a syntax error with no partial report', () => {
    const orchestrator = new FileAnalysisOrchestrator('bad.py');
    expect(() => orchestrator.openText(source('x = 1;', 'def broken(:', '    pass'))).toThrow(ParseError);
    expect(orchestrator.state).toBe(AnalysisState.Closed);
    expect(() => Array.from(orchestrator.stream())).toThrow(ProcessingError);
  });

  it('walks through its states in order', () => {
    const orchestrator = new FileAnalysisOrchestrator('a.py');
    expect(orchestrator.state).toBe(AnalysisState.Unopened);

    orchestrator.openText(source('x = 1;', 'y = 2;'));
    expect(orchestrator.state).toBe(AnalysisState.Parsed);

    const stream = orchestrator.stream();
    expect(stream.next().value).toEqual({
      file: 'a.py',
      line: 1,
      issue: { code: 'S003', message: 'Unnecessary semicolon' },
    });
    expect(orchestrator.state).toBe(AnalysisState.Streaming);

    expect(Array.from(stream)).toHaveLength(1);
    expect(orchestrator.state).toBe(AnalysisState.Closed);
  });

  it('refuses to stream before parsing', () => {
    const orchestrator = new FileAnalysisOrchestrator('a.py');
    expect(() => orchestrator.report()).toThrow(ProcessingError);
    expect(orchestrator.state).toBe(AnalysisState.Unopened);
  });

  it('refuses to open twice', () => {
    const orchestrator = new FileAnalysisOrchestrator('a.py');
    orchestrator.openText('x = 1\n');
    expect(() => orchestrator.openText('x = 1\n')).toThrow(ProcessingError);
  });

  it('reads files from disk and labels diagnostics with the display path', async () => {
    const file = writeTemp('module.py', source('class my_class:', '    pass'));
    const report = await analyzeFile(file, 'pkg/module.py');
    expect(report).toEqual({
      file: 'pkg/module.py',
      diagnostics: [
        {
          file: 'pkg/module.py',
          line: 1,
          issue: { code: 'S008', message: 'Class name my_class should use CamelCase' },
        },
      ],
    });
  });

  it('raises FileReadError for a missing file and closes', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'pystylelint-'));
    const missing = path.join(dir, 'missing.py');
    const orchestrator = new FileAnalysisOrchestrator(missing);
    await expect(orchestrator.open()).rejects.toBeInstanceOf(FileReadError);
    expect(orchestrator.state).toBe(AnalysisState.Closed);
  });

  it('raises FileReadError for bytes that are not UTF-8', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'pystylelint-'));
    const file = path.join(dir, 'latin1.py');
    writeFileSync(file, Buffer.from([0x78, 0x20, 0x3d, 0x20, 0xff, 0x0a]));
    const orchestrator = new FileAnalysisOrchestrator(file);
    await expect(orchestrator.open()).rejects.toBeInstanceOf(FileReadError);
    await expect(readSource(file)).rejects.toThrow(`Cannot decode ${file}`);
    expect(orchestrator.state).toBe(AnalysisState.Closed);
  });

  it('produces identical reports for an unchanged file', async () => {
    const file = writeTemp('same.py', source('def f(x={}):', '    Y = x;', '    return Y'));
    const first = await analyzeFile(file);
    const second = await analyzeFile(file);
    expect(second).toEqual(first);
    expect(summarize(first)).toEqual(['1:S012', '2:S003', '2:S011']);
  });
});
