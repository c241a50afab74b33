import type { FileReport } from '../analyzer/types';

export enum OutputFormat {
  Line = 'line',
  Json = 'json',
}

export interface AnalysisOptions {
  concurrency: number;
  outputFormat: OutputFormat;
  cwd: string;
}

export interface FileFailure {
  file: string;
  error: Error;
}

export type FileOutcome =
  | { ok: true; file: string; report: FileReport }
  | { ok: false; file: string; error: Error };

export interface AnalysisResult {
  totalFiles: number;
  totalIssues: number;
  failures: FileFailure[];
  hadFailures: boolean;
  hadIssues: boolean;
}
