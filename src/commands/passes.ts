/**
 * Passes Command
 * Lists the available analysis passes
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getAvailablePasses } from '../analyzers/flow-graph/index.js';

export function createPassesCommand(): Command {
  return new Command('passes')
    .description('List available analysis passes in execution order')
    .action(() => {
      console.log(chalk.cyan('\nAvailable passes:\n'));
      for (const pass of getAvailablePasses()) {
        console.log(`  ${chalk.yellow(pass.id.padEnd(22))}${pass.description}`);
      }
      console.log('');
    });
}
