#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { logger } from './utils/logger.js';
import { setupCheckCommand } from './commands/check.js';
import { setupListCommand } from './commands/list.js';
import { setupDetailsCommand } from './commands/details.js';
import { setupInstallCommand } from './commands/install.js';

/**
 * pkupdates CLI - Main entry point
 *
 * Checks for and installs system package updates through a package daemon.
 */

function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error });
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('pkupdates')
  .description('Check for and install system package updates')
  .version(getVersion())
  .option('--backend <file>', 'backend manifest replayed by the bundled daemon')
  .option('--home <dir>', 'configuration and state directory (default: ~/.pkupdates)')
  .configureHelp({ sortSubcommands: true });

setupCheckCommand(program);
setupListCommand(program);
setupDetailsCommand(program);
setupInstallCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with PKUPDATES_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with PKUPDATES_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  });
}

export { program };
