import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { Diagnostic } from '../analyzer/types';
import type { RuleInfo } from '../rules/catalog';
import { error } from './logger';

/**
 * One diagnostic as a plain-text line: `<path>: Line <n>: <code> <message>`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { file, line, issue } = diagnostic;
  return `${file}: Line ${line}: ${issue.code} ${issue.message}`;
}

export function formatFileFailure(file: string, error: Error): string {
  return `${file}: ${error.name}: ${error.message}`;
}

export function printFileFailure(file: string, failure: Error) {
  error(chalk.red(formatFileFailure(file, failure)));
}

export function printGlobalSummary(files: number, issues: number, failures: number = 0) {
  const okMark = issues === 0 ? chalk.green('✓') : chalk.red('✖');
  const issueTxt = issues === 1 ? '1 issue' : `${issues} issues`;
  const fileTxt = files === 1 ? '1 file' : `${files} files`;

  const coloredIssues = issues > 0 ? chalk.red(issueTxt) : chalk.green(issueTxt);

  // "X issues in Z files."
  console.error(`${okMark} ${coloredIssues} in ${fileTxt}.`);

  if (failures > 0) {
    const failTxt = failures === 1 ? '1 file failed' : `${failures} files failed`;
    console.error(chalk.red(`✖ ${failTxt}`));
  }
}

function padVisible(text: string, width: number): string {
  const pad = Math.max(0, width - stripAnsi(text).length);
  return text + ' '.repeat(pad);
}

export function printRulesTable(rules: readonly RuleInfo[]) {
  const slugWidth = Math.max(...rules.map((rule) => rule.slug.length));
  for (const rule of rules) {
    const code = chalk.bold(rule.code);
    const slug = padVisible(chalk.cyan(rule.slug), slugWidth);
    const kind = padVisible(chalk.dim(rule.kind), 'lexical'.length);
    console.log(`${code}  ${slug}  ${kind}  ${rule.description}`);
  }
}
