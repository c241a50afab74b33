import type { Command } from 'commander';
import { RULES } from '../rules/catalog';
import { printRulesTable } from '../output/reporter';

/*
 * Registers the `rules` command, which lists every check with its code and slug.
 */
export function registerRulesCommand(program: Command): void {
  program
    .command('rules')
    .description('List the style checks with their codes, slugs and kinds')
    .action(() => {
      printRulesTable(RULES);
    });
}
