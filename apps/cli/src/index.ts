#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for pack-doctor.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { PackDoctorError } from '@pack-doctor/core';
import { setLogLevel } from '@pack-doctor/utils';

// Commands
import { checkCommand } from './commands/check.js';
import { configCommand } from './commands/config.js';
import { config } from './config/index.js';
import { waitForEnter } from './lib/prompt.js';
import { printError } from './lib/output.js';

const program = new Command();

program
  .name('pack-doctor')
  .description('Check and repair Minecraft resource packs')
  .version('1.0.0')
  .option('--debug', 'Enable debug output');

program.hook('preAction', (command) => {
  const debug = command.opts<{ debug?: boolean }>().debug === true || config.debug;
  setLogLevel(debug ? 'debug' : config.logLevel ?? 'warn');
});

// ============================================
// CHECK
// ============================================

program
  .command('check [directory]', { isDefault: true })
  .description('Check a resource pack (defaults to the current directory)')
  .option('-y, --yes', 'Fix everything without asking')
  .option('--no-backup', 'Skip the backup copy of assets/ and pack.mcmeta')
  .option('--max-attempts <count>', 'Maximum number of checking passes')
  .option('--json', 'Print the final outcome as JSON')
  .action(checkCommand);

// ============================================
// CONFIGURATION
// ============================================

program
  .command('config [key] [value]')
  .description('View or modify persisted defaults')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('pack-doctor --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof PackDoctorError) {
    printError(error.message);
  } else {
    printError('Something went wrong. Please report this with the details below:');
    console.error(error instanceof Error ? error.stack ?? error.message : error);
    await waitForEnter('Press enter to exit...');
  }
  process.exitCode = 1;
}
