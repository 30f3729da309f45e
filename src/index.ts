#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { logger } from './utils/logger.js';
import { isDirectory } from './utils/fs.js';
import { getVersion } from './utils/package.js';
import { LogLevel, type GlobalOptions } from './types/index.js';

// Import command setup functions
import { setupLsCommand } from './commands/ls.js';
import { setupPackagesCommand } from './commands/packages.js';

/**
 * Strata CLI - Main entry point
 *
 * Selects resources from a project's dependency graph.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('strata')
  .description('Strata - select resources from a data transformation graph')
  .version(getVersion())
  .option('--project-dir <dir>', 'directory containing strata_project.yml (default: cwd)')
  .option('--verbose', 'print debug logs')
  .configureHelp({
    sortSubcommands: true
  });

// === SELECTION COMMANDS ===
setupLsCommand(program);
setupPackagesCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<GlobalOptions>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.projectDir) {
    const resolvedDir = path.resolve(process.cwd(), opts.projectDir);
    if (!(await isDirectory(resolvedDir))) {
      logger.error('Invalid --project-dir provided', { projectDir: opts.projectDir });
      console.error(`❌ Invalid --project-dir '${opts.projectDir}': directory does not exist`);
      process.exit(1);
    }
    program.setOptionValue('projectDir', resolvedDir);
    logger.debug(`Project directory: ${resolvedDir}`);
  } else {
    logger.debug(`Project directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // If no arguments provided (just 'strata'), show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('strata')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
