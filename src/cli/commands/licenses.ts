import { Command } from 'commander';
import chalk from 'chalk';
import { LICENSES, LICENSE_NAMES } from '../../core/templates/index.js';

/**
 * Create the licenses command.
 */
export function createLicensesCommand(): Command {
  return new Command('licenses')
    .description('List the licenses that can be passed to --license')
    .action(() => {
      for (const name of LICENSE_NAMES) {
        console.log(`  ${chalk.cyan(name)} ${chalk.dim(`(${LICENSES[name]})`)}`);
      }
    });
}
