#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupSetupCommand } from './commands/setup.js';
import { setupDetectCommand } from './commands/detect.js';
import { setupEnvCommand } from './commands/env.js';

/**
 * lintflow CLI - Main entry point
 *
 * Applies a shared code quality setup (hooks, CI workflows, lint config,
 * engineering docs) to an existing Flutter or React Native project.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('lintflow')
  .description('lintflow - code quality setup for Flutter and React Native projects')
  .version(getVersion())
  .option('--verbose', 'print diagnostic logging')
  .configureHelp({
    sortSubcommands: true,
  })
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose === true) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

setupSetupCommand(program);
setupDetectCommand(program);
setupEnvCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('lintflow')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
