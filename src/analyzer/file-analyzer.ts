import { open } from 'fs/promises';
import { TextDecoder } from 'util';
import { FileReadError, ProcessingError, handleUnknownError } from '../errors/index';
import { parsePython, type ParsedModule } from '../boundaries/python-parser';
import { checkLine } from './line-checker';
import { normalizeSource, splitLines } from './line-numbering';
import { SourceLine } from './source-line';
import { checkTree } from './tree-checker';
import type { Diagnostic, FileReport, LineIssueIndex } from './types';

export enum AnalysisState {
  Unopened = 'unopened',
  Opened = 'opened',
  Parsed = 'parsed',
  Streaming = 'streaming',
  Closed = 'closed',
}

function systemCodeOf(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

function toReadError(e: unknown, filePath: string, action: string): FileReadError {
  const err = handleUnknownError(e, `${action} ${filePath}`);
  return new FileReadError(`${action} ${filePath}: ${err.message}`, filePath, systemCodeOf(e));
}

const UTF8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a whole file as strict UTF-8. The handle is closed on every path,
 * including read failures; undecodable bytes are a FileReadError.
 */
export async function readSource(filePath: string): Promise<string> {
  const handle = await open(filePath, 'r').catch((e: unknown) => {
    throw toReadError(e, filePath, 'Cannot open');
  });
  let bytes: Buffer;
  try {
    bytes = await handle.readFile();
  } catch (e: unknown) {
    throw toReadError(e, filePath, 'Cannot read');
  } finally {
    await handle.close();
  }
  try {
    return UTF8.decode(bytes);
  } catch (e: unknown) {
    throw toReadError(e, filePath, 'Cannot decode');
  }
}

/*
 * Lexical issues for each line first, then the tree issues recorded for it.
 * Blank lines only advance the blank-line counter.
 */
function* emitDiagnostics(
  file: string,
  text: string,
  treeIssues: LineIssueIndex
): Generator<Diagnostic> {
  let blankLinesBefore = 0;
  let index = 1;
  for (const rawText of splitLines(text)) {
    const line = new SourceLine(rawText, index, blankLinesBefore);
    if (line.isBlank) {
      blankLinesBefore += 1;
    } else {
      for (const issue of checkLine(line)) {
        yield { file, line: index, issue };
      }
      for (const issue of treeIssues.get(index) ?? []) {
        yield { file, line: index, issue };
      }
      blankLinesBefore = 0;
    }
    index += 1;
  }
}

/**
 * Analyzes one file: read once, parse, run the tree checks, then stream
 * line-by-line diagnostics in ascending line order.
 *
 * States move unopened -> opened -> parsed -> streaming -> closed. A read or
 * parse failure moves straight to closed and rethrows; there is no retry.
 */
export class FileAnalysisOrchestrator {
  private currentState: AnalysisState = AnalysisState.Unopened;
  private module: ParsedModule | undefined;
  private treeIssues: LineIssueIndex = new Map();

  constructor(readonly file: string, private readonly displayPath: string = file) {}

  get state(): AnalysisState {
    return this.currentState;
  }

  async open(): Promise<void> {
    if (this.currentState !== AnalysisState.Unopened) {
      throw new ProcessingError(`Cannot open ${this.file} in state '${this.currentState}'`);
    }
    try {
      const text = normalizeSource(await readSource(this.file));
      this.currentState = AnalysisState.Opened;
      this.load(text);
    } catch (e: unknown) {
      this.currentState = AnalysisState.Closed;
      throw e;
    }
  }

  /**
   * Same protocol as open(), for text already in memory.
   */
  openText(text: string): void {
    if (this.currentState !== AnalysisState.Unopened) {
      throw new ProcessingError(`Cannot open ${this.file} in state '${this.currentState}'`);
    }
    this.currentState = AnalysisState.Opened;
    try {
      this.load(normalizeSource(text));
    } catch (e: unknown) {
      this.currentState = AnalysisState.Closed;
      throw e;
    }
  }

  *stream(): Generator<Diagnostic> {
    if (this.currentState !== AnalysisState.Parsed || !this.module) {
      throw new ProcessingError(`Cannot stream ${this.file} in state '${this.currentState}'`);
    }
    this.currentState = AnalysisState.Streaming;
    try {
      yield* emitDiagnostics(this.displayPath, this.module.text, this.treeIssues);
    } finally {
      this.currentState = AnalysisState.Closed;
    }
  }

  report(): FileReport {
    return { file: this.displayPath, diagnostics: Array.from(this.stream()) };
  }

  private load(text: string): void {
    this.module = parsePython(text);
    // tree issues must exist before the first line is emitted
    this.treeIssues = checkTree(this.module);
    this.currentState = AnalysisState.Parsed;
  }
}

export async function analyzeFile(file: string, displayPath: string = file): Promise<FileReport> {
  const orchestrator = new FileAnalysisOrchestrator(file, displayPath);
  await orchestrator.open();
  return orchestrator.report();
}

export function analyzeSource(file: string, text: string): FileReport {
  const orchestrator = new FileAnalysisOrchestrator(file);
  orchestrator.openText(text);
  return orchestrator.report();
}
