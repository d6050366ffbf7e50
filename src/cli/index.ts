#!/usr/bin/env node
/**
 * pipewright CLI
 * Command-line interface for generating PowerShell scripts from graph snapshots
 */

import * as fs from 'fs';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { generateCommand } from './commands/generate.js';
import { validateCommand } from './commands/validate.js';
import { describeCommand } from './commands/describe.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8')
    );
    return z.object({ version: z.string() }).parse(raw).version;
  } catch (error) {
    logger.debug(`Could not read package version: ${getErrorMessage(error)}`);
    return '0.0.0-dev';
  }
}

const program = new Command();

program
  .name('pipewright')
  .description('Generate PowerShell 5.1 scripts from block graph snapshots')
  .version(readVersion(), '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

// Generate command
program
  .command('generate <input>')
  .description('Generate scripts from snapshot files (file, directory or glob)')
  .option('-o, --output <path>', 'Output file, or directory when there are several inputs')
  .option('--stdout', 'Print scripts to stdout instead of writing files', false)
  .option('--indent <n>', 'Spaces per indentation level')
  .option('--no-header', 'Omit the banner comment')
  .option('--timestamp', 'Stamp the banner with the generation time')
  .option('-c, --config <path>', 'Config file (default: pipewright.config.yaml)')
  .option('--dry-run', 'Preview generation without writing files', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (input: string, options) => {
    try {
      await generateCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Validate command
program
  .command('validate <input>')
  .description('Check snapshot files for cycles and broken references')
  .option('--json', 'Print a machine-readable report', false)
  .option('--verbose', 'Verbose output', false)
  .action(async (input: string, options) => {
    try {
      await validateCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

// Describe command
program
  .command('describe <input>')
  .description('Print the emission plan of a snapshot (order, chains, bindings)')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text'))
  .action(async (input: string, options) => {
    try {
      await describeCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.on('--help', () => {
  logger.newline();
  logger.section('Examples');
  logger.log('  $ pipewright generate graph.json');
  logger.log("  $ pipewright generate 'graphs/**/*.json' -o scripts");
  logger.log('  $ pipewright generate graph.json --stdout --indent 2');
  logger.log('  $ pipewright validate graphs --json');
  logger.log('  $ pipewright describe graph.json --format json');
  logger.newline();
});

await program.parseAsync(process.argv);

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
}
