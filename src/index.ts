#!/usr/bin/env node
import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createPassesCommand } from './commands/passes.js';

// Get version from package.json
const PackageJsonSchema = z.object({ version: z.string() }).passthrough();
const pkg = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

const program = new Command()
  .name('flow-graph-lint')
  .description('Static analysis for exported conversational flow definitions')
  .version(pkg.version, '-v, --version', 'output the current version');

program.addCommand(createCheckCommand());
program.addCommand(createPassesCommand());

await program.parseAsync(process.argv);
