import type { Command } from 'commander';
import { loadConfig } from '../config/config';
import { printGlobalSummary } from '../output/reporter';
import { setSilentMode, setVerboseMode, debug } from '../output/logger';
import { resolveTargets } from '../scan/file-resolver';
import { parseCliOptions } from '../boundaries/cli-parser';
import { handleUnknownError } from '../errors/index';
import { analyzeFiles } from './orchestrator';
import { OutputFormat } from './types';

/*
 * Registers the main check command with Commander.
 * This is the default command that runs every style check against the target files.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-v, --verbose', 'Enable verbose logging and print a summary')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom .pystylelint.ini config file')
    .argument('<paths...>', 'files, directories or globs to check')
    .action(async (paths: string[]) => {
      // Parse and validate CLI options
      let cliOptions;
      try {
        cliOptions = parseCliOptions(program.opts());
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const outputFormat = cliOptions.output === 'json' ? OutputFormat.Json : OutputFormat.Line;
      // JSON output owns stdout
      setSilentMode(outputFormat === OutputFormat.Json);
      setVerboseMode(cliOptions.verbose);

      const cwd = process.cwd();

      let config;
      try {
        config = loadConfig(cwd, cliOptions.config);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Loading configuration');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }
      debug(`config directory: ${config.configDir}, concurrency: ${config.concurrency}`);

      // Resolve target files
      let targets: string[] = [];
      try {
        targets = resolveTargets({ cliArgs: paths, cwd, exclude: config.exclude });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Resolving target files');
        console.error(`Error: failed to resolve target files: ${err.message}`);
        process.exit(1);
      }

      if (targets.length === 0) {
        console.error('Error: no target files found to check.');
        process.exit(1);
      }
      debug(`checking ${targets.length} file(s)`);

      let result;
      try {
        result = await analyzeFiles(targets, {
          concurrency: config.concurrency,
          outputFormat,
          cwd,
        });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Checking files');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      if (cliOptions.verbose) {
        printGlobalSummary(result.totalFiles, result.totalIssues, result.failures.length);
      }

      // Exit with 0 only when every file was checked and nothing was found
      process.exit(result.hadIssues || result.hadFailures ? 1 : 0);
    });
}
