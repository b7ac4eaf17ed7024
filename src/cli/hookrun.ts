#!/usr/bin/env node
/**
 * hookrun - Run git hooks against staged files
 *
 * Commands:
 *   hookrun [hook-id]        Run hooks against staged files
 *   hookrun run [hook-id]    Same as above
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { runCommand } from './hookrun/run.js';
import { initializeLogger } from '../lib/logger.js';
import { installSignalHandlers } from '../lib/cleanup.js';
import * as colors from '../lib/colors.js';

// Initialize logger early (before yargs) so config loading can log
function initializeLoggerFromCliFlags(): void {
  const args = process.argv.slice(2);
  initializeLogger({
    verbose: args.includes('-v') || args.includes('--verbose') || undefined,
    quiet: args.includes('-q') || args.includes('--quiet'),
    noColor: args.includes('--no-color'),
  });
}

initializeLoggerFromCliFlags();
installSignalHandlers();

yargs(hideBin(process.argv))
  .scriptName('hookrun')
  .usage('$0 [command] [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show hook output and durations even when hooks pass',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only log errors',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output (--no-color to disable)',
    global: true,
  })
  .command(runCommand)
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .strict()
  .fail((msg, err) => {
    console.error(colors.error(err ? err.message : msg));
    process.exit(2);
  })
  .parseAsync()
  .catch((err: unknown) => {
    console.error(colors.error(err instanceof Error ? err.message : String(err)));
    process.exit(2);
  });
