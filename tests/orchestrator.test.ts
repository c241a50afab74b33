import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import stripAnsi from 'strip-ansi';
import { analyzeFiles, runWithConcurrency } from '../src/cli/orchestrator';
import { OutputFormat } from '../src/cli/types';
import { setSilentMode, setVerboseMode } from '../src/output/logger';
import { ParseError } from '../src/errors/index';

function setupFiles(files: Record<string, string>): string {
  const root = mkdtempSync(path.join(tmpdir(), 'pystylelint-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(root, name), content);
  }
  return root;
}

describe('runWithConcurrency', () => {
  it('keeps results in input order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await runWithConcurrency(delays, 2, async (ms, idx) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return idx;
    });
    expect(results).toEqual([0, 1, 2, 3]);
  });

  it('never runs more workers than the limit', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });
    expect(peak).toBe(2);
  });
});

describe('analyzeFiles', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    setSilentMode(false);
    setVerboseMode(false);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one block per file in target order and reports failures', async () => {
    const root = setupFiles({
      'a.py': 'x = 1;\ny = 2;\n',
      'b.py': 'class my_class:\n    pass\n',
      'bad.py': 'def broken(:\n',
      'clean.py': 'x = 1\n',
    });
    const targets = ['a.py', 'bad.py', 'b.py', 'clean.py'].map((name) => path.join(root, name));

    const result = await analyzeFiles(targets, {
      concurrency: 3,
      outputFormat: OutputFormat.Line,
      cwd: root,
    });

    expect(logSpy.mock.calls).toEqual([
      ['a.py: Line 1: S003 Unnecessary semicolon\na.py: Line 2: S003 Unnecessary semicolon'],
      ['b.py: Line 1: S008 Class name my_class should use CamelCase'],
    ]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(stripAnsi(String(errorSpy.mock.calls[0]?.[0]))).toMatch(
      /^bad\.py: ParseError: invalid syntax at line \d+, column \d+$/
    );

    expect(result.totalFiles).toBe(4);
    expect(result.totalIssues).toBe(3);
    expect(result.hadIssues).toBe(true);
    expect(result.hadFailures).toBe(true);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.file).toBe('bad.py');
    expect(result.failures[0]?.error).toBeInstanceOf(ParseError);
  });

  it('reports a clean run', async () => {
    const root = setupFiles({ 'clean.py': 'def run(value):\n    return value\n' });
    const result = await analyzeFiles([path.join(root, 'clean.py')], {
      concurrency: 4,
      outputFormat: OutputFormat.Line,
      cwd: root,
    });
    expect(logSpy).not.toHaveBeenCalled();
    expect(result).toEqual({
      totalFiles: 1,
      totalIssues: 0,
      failures: [],
      hadFailures: false,
      hadIssues: false,
    });
  });

  it('reports a missing file as a read failure without stopping the batch', async () => {
    const root = setupFiles({ 'a.py': 'x = 1;\n' });
    const result = await analyzeFiles([path.join(root, 'gone.py'), path.join(root, 'a.py')], {
      concurrency: 1,
      outputFormat: OutputFormat.Line,
      cwd: root,
    });
    expect(result.failures.map((f) => [f.file, f.error.name])).toEqual([['gone.py', 'FileReadError']]);
    expect(logSpy.mock.calls).toEqual([['a.py: Line 1: S003 Unnecessary semicolon']]);
  });

  it('writes a single JSON document in JSON mode', async () => {
    const root = setupFiles({
      'a.py': 'x = 1  # todo\n',
      'bad.py': 'def broken(:\n',
    });
    setSilentMode(true);
    await analyzeFiles([path.join(root, 'a.py'), path.join(root, 'bad.py')], {
      concurrency: 2,
      outputFormat: OutputFormat.Json,
      cwd: root,
    });

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    const doc: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(doc).toMatchObject({
      files: {
        'a.py': { issues: [{ line: 1, code: 'S005', rule: 'todo-comment', message: 'TODO found' }] },
      },
      failures: [{ file: 'bad.py', error: 'ParseError' }],
      summary: { files: 2, issues: 1, failures: 1 },
    });
  });
});
