#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { z } from 'zod';
import { encodeCommand, decodeCommand, infoCommand } from './cli/commands/index.js';
import { createLogger, type Logger } from './cli/logger.js';
import { resolveLogLevel, type VerbosityFlags } from './config/index.js';

const PackageSchema = z.object({ version: z.string() });

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg = PackageSchema.parse(require('../package.json'));
const VERSION = pkg.version;

const program = new Command();

program
  .name('bytepix')
  .description('Store any file inside the pixels of a lossless PNG image, and get it back')
  .version(VERSION, '-v, --version', 'Show version number')
  .option('-q, --quiet', 'Only print errors')
  .option('--verbose', 'Print debug output');

function loggerFor(command: Command): Logger {
  return createLogger(resolveLogLevel(command.optsWithGlobals<VerbosityFlags>()));
}

function finish(ok: boolean): void {
  if (!ok) {
    process.exitCode = 1;
  }
}

// Encode command
program
  .command('encode <input> [output]')
  .alias('enc')
  .description('Hide a file in a PNG image (default output: <input>.png)')
  .option('-f, --force', 'Overwrite the output image if it exists')
  .action(async (input: string, output: string | undefined, options: { force?: boolean }, command: Command) => {
    const logger = loggerFor(command);
    logger.info(chalk.bold('Encode'));
    finish(await encodeCommand(input, output, options, logger));
  });

// Decode command
program
  .command('decode <image> [output]')
  .alias('dec')
  .description('Recover a file from a PNG image written by encode')
  .option('-f, --force', 'Overwrite the output file if it exists')
  .action(async (image: string, output: string | undefined, options: { force?: boolean }, command: Command) => {
    const logger = loggerFor(command);
    logger.info(chalk.bold('Decode'));
    finish(await decodeCommand(image, output, options, logger));
  });

// Info command
program
  .command('info <image>')
  .description('Show the payload header and capacity of a PNG image')
  .action(async (image: string, _options: unknown, command: Command) => {
    finish(await infoCommand(image, loggerFor(command)));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\n  Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`));
  process.exitCode = 1;
});
