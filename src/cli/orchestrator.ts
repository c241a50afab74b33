import * as path from "path";
import { analyzeFile } from "../analyzer/file-analyzer";
import { ParseError, isFileFailure } from "../errors/index";
import { JsonFormatter, type JsonFailure } from "../output/json-formatter";
import { formatDiagnostic, printFileFailure } from "../output/reporter";
import { debug, log } from "../output/logger";
import { OutputFormat } from "./types";
import type {
  AnalysisOptions,
  AnalysisResult,
  FileFailure,
  FileOutcome,
} from "./types";

/*
 * Generic concurrency runner that executes workers in parallel up to a specified limit.
 * Preserves result order matching input order.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  const workers = new Array(Math.min(limit, items.length))
    .fill(0)
    .map(async () => {
      while (true) {
        const idx = i++;
        if (idx >= items.length) break;
        const item = items[idx];
        if (item !== undefined) {
          results[idx] = await worker(item, idx);
        }
      }
    });
  await Promise.all(workers);
  return results;
}

function displayPathFor(file: string, cwd: string): string {
  return path.relative(cwd, file) || file;
}

/*
 * Analyzes one file. Parse and read failures become a failed outcome so that
 * sibling files keep running; anything else is a bug and propagates.
 */
async function analyzeTarget(file: string, cwd: string): Promise<FileOutcome> {
  const displayPath = displayPathFor(file, cwd);
  try {
    const report = await analyzeFile(file, displayPath);
    debug(`${displayPath}: ${report.diagnostics.length} issue(s)`);
    return { ok: true, file: displayPath, report };
  } catch (e: unknown) {
    if (isFileFailure(e)) {
      debug(`${displayPath}: ${e.name}`);
      return { ok: false, file: displayPath, error: e };
    }
    throw e;
  }
}

function toJsonFailure(failure: FileFailure): JsonFailure {
  const { file, error } = failure;
  const entry: JsonFailure = { file, error: error.name, message: error.message };
  if (error instanceof ParseError) {
    entry.line = error.line;
    entry.column = error.column;
  }
  return entry;
}

/*
 * Writes one file's block. Line output goes out in a single write so blocks
 * from different files never interleave.
 */
function reportOutcome(outcome: FileOutcome, jsonFormatter: JsonFormatter | undefined): void {
  if (!outcome.ok) {
    if (jsonFormatter) {
      jsonFormatter.addFailure(toJsonFailure(outcome));
    } else {
      printFileFailure(outcome.file, outcome.error);
    }
    return;
  }

  const { diagnostics } = outcome.report;
  if (jsonFormatter) {
    jsonFormatter.addFile(outcome.file);
    for (const diagnostic of diagnostics) {
      jsonFormatter.addDiagnostic(diagnostic);
    }
    return;
  }
  if (diagnostics.length > 0) {
    log(diagnostics.map(formatDiagnostic).join("\n"));
  }
}

export async function analyzeFiles(
  targets: string[],
  options: AnalysisOptions
): Promise<AnalysisResult> {
  const { concurrency, cwd, outputFormat } = options;

  const jsonFormatter = outputFormat === OutputFormat.Json ? new JsonFormatter() : undefined;

  const outcomes = await runWithConcurrency(targets, concurrency, (file) =>
    analyzeTarget(file, cwd)
  );

  let totalIssues = 0;
  const failures: FileFailure[] = [];
  for (const outcome of outcomes) {
    reportOutcome(outcome, jsonFormatter);
    if (outcome.ok) {
      totalIssues += outcome.report.diagnostics.length;
    } else {
      failures.push({ file: outcome.file, error: outcome.error });
    }
  }

  // Output results based on format (always to stdout for JSON)
  if (jsonFormatter) {
    console.log(jsonFormatter.toJson());
  }

  return {
    totalFiles: targets.length,
    totalIssues,
    failures,
    hadFailures: failures.length > 0,
    hadIssues: totalIssues > 0,
  };
}
