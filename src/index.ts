#!/usr/bin/env node
import { program } from 'commander';
import { VERSION } from './config/version';
import { registerMainCommand } from './cli/commands';
import { registerRulesCommand } from './cli/rules-command';

// Set up Commander program
program
  .name('pystylelint')
  .description('Style checker for Python source files')
  .version(VERSION);

// Register commands
registerRulesCommand(program);
registerMainCommand(program);

// Parse command line arguments
program.parseAsync().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
