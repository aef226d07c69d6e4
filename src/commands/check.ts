/**
 * Check Command
 * CLI command that analyzes an exported agent directory
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import * as prompts from '@clack/prompts';
import {
  runFlowLintWithOutput,
  EXIT_FAILURE,
  type OutputFormat,
} from '../analyzers/flow-graph/index.js';
import { ConfigurationError } from '../analyzers/errors.js';
import { logger, LogLevel } from '../utils/logger.js';

interface CheckCommandOptions {
  format: string;
  config?: string;
  threshold?: string;
  flow: string[];
  maxWarnings: string;
  quiet: boolean;
  color: boolean;
  debug: boolean;
}

/**
 * Collect multiple values for an option
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Parse an optional numeric flag
 */
function parseThreshold(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const threshold = Number(value);
  if (!Number.isInteger(threshold) || threshold <= 0) {
    throw new ConfigurationError(`--threshold must be a positive integer, got "${value}"`);
  }
  return threshold;
}

/**
 * Parse --max-warnings; -1 disables the limit
 */
function parseMaxWarnings(value: string): number {
  const maxWarnings = Number(value);
  if (value.trim() === '' || !Number.isInteger(maxWarnings) || maxWarnings < -1) {
    throw new ConfigurationError(`--max-warnings must be an integer of -1 or more, got "${value}"`);
  }
  return maxWarnings;
}

/**
 * Create the check command
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Analyze an exported agent directory for structural flow defects')
    .argument('<agentDir>', 'Root of the exported agent (contains flows/)')
    .addOption(
      new Option('--format <type>', 'Output format').choices(['stylish', 'json']).default('stylish')
    )
    .option('--config <path>', 'Config file path')
    .option('--threshold <n>', 'Loop detection cost threshold')
    .option('--flow <name>', 'Only report findings of this flow (can be repeated)', collect, [])
    .option(
      '--max-warnings <n>',
      'Exit with error if warnings exceed threshold (-1 = no limit)',
      '-1'
    )
    .option('-q, --quiet', 'Only report errors, not warnings', false)
    .option('--no-color', 'Disable colored output')
    .option('--debug', 'Print debug logs to stderr', false)
    .action(async (agentDir: string, options: CheckCommandOptions) => {
      const format: OutputFormat = options.format === 'json' ? 'json' : 'stylish';

      let exitCode: number;

      try {
        if (options.debug) {
          logger.setLevel(LogLevel.DEBUG);
        }

        const threshold = parseThreshold(options.threshold);
        const maxWarnings = parseMaxWarnings(options.maxWarnings);

        if (format !== 'json') {
          prompts.intro(chalk.cyan('Flow Graph Lint'));
        }

        exitCode = await runFlowLintWithOutput(agentDir, {
          format,
          configPath: options.config,
          threshold,
          flows: options.flow,
          maxWarnings,
          quiet: options.quiet,
          noColor: !options.color,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (format === 'json') {
          console.log(JSON.stringify({ error: message }));
        } else {
          prompts.log.error(`Error: ${message}`);
        }
        logger.debug('Flow lint failed', {
          stack: error instanceof Error ? error.stack : undefined,
        });
        exitCode = EXIT_FAILURE;
      }

      process.exit(exitCode);
    });
}
