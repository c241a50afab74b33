import { VERSION } from '../config/version';
import { getRule } from '../rules/catalog';
import type { Diagnostic } from '../analyzer/types';

export interface JsonIssue {
  line: number;
  code: string;
  rule: string;
  message: string;
}

export interface JsonFailure {
  file: string;
  error: string;
  message: string;
  line?: number;
  column?: number;
}

export interface FileResult {
  issues: JsonIssue[];
}

export interface Result {
  files: Record<string, FileResult>;
  failures: JsonFailure[];
  summary: {
    files: number;
    issues: number;
    failures: number;
  };
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter {
  private files: Record<string, FileResult> = {};
  private failures: JsonFailure[] = [];
  private issueCount = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  // Registers a file even when it has no issues
  addFile(file: string): void {
    if (!this.files[file]) {
      this.files[file] = { issues: [] };
    }
  }

  addDiagnostic(diagnostic: Diagnostic): void {
    this.addFile(diagnostic.file);
    this.files[diagnostic.file]?.issues.push({
      line: diagnostic.line,
      code: diagnostic.issue.code,
      rule: getRule(diagnostic.issue.code).slug,
      message: diagnostic.issue.message,
    });
    this.issueCount++;
  }

  addFailure(failure: JsonFailure): void {
    this.failures.push(failure);
  }

  toResult(): Result {
    return {
      files: this.files,
      failures: this.failures,
      summary: {
        files: Object.keys(this.files).length + this.failures.length,
        issues: this.issueCount,
        failures: this.failures.length,
      },
      metadata: {
        version: VERSION,
        timestamp: this.now().toISOString(),
      },
    };
  }

  toJson(): string {
    return JSON.stringify(this.toResult(), null, 2);
  }
}
