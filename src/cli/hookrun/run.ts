/**
 * hookrun run - Run the configured hooks
 *
 * Exit codes: 0 when every hook passed or was skipped, 1 when a hook failed,
 * 2 when the run could not be carried out.
 */

import type { CommandModule } from 'yargs';
import { run } from '../../lib/run.js';
import * as colors from '../../lib/colors.js';
import { logger } from '../../lib/logger.js';
import { isHookRunError } from '../../lib/errors.js';

export const EXIT_SUCCESS = 0;
export const EXIT_HOOK_FAILED = 1;
export const EXIT_FATAL = 2;

export interface RunArgs {
  'hook-id'?: string;
  'all-files'?: boolean;
  files?: string[];
  'fail-fast'?: boolean;
  'show-diff-on-failure'?: boolean;
  verbose?: boolean;
  config?: string;
}

/**
 * Run hooks for parsed arguments and map the result to an exit code
 */
export async function executeRun(argv: RunArgs): Promise<number> {
  try {
    const result = await run({
      hookId: argv['hook-id'],
      allFiles: !!argv['all-files'],
      files: argv.files?.map(String),
      failFast: !!argv['fail-fast'],
      showDiffOnFailure: !!argv['show-diff-on-failure'],
      verbose: !!argv.verbose,
      config: argv.config,
    });
    return result.success ? EXIT_SUCCESS : EXIT_HOOK_FAILED;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (!isHookRunError(error)) {
      logger.debug('Unexpected error:', error);
    }
    console.error(colors.error(message));
    return EXIT_FATAL;
  }
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: ['run [hook-id]', '$0 [hook-id]'],
  describe: 'Run hooks against staged files',
  builder: (yargs) => {
    return yargs
      .positional('hook-id', {
        type: 'string',
        description: 'Only run the hook with this id or alias',
      })
      .option('all-files', {
        alias: 'a',
        type: 'boolean',
        description: 'Run on every file in the repository',
        default: false,
      })
      .option('files', {
        type: 'string',
        array: true,
        description: 'Run on these files',
        conflicts: 'all-files',
      })
      .option('fail-fast', {
        type: 'boolean',
        description: 'Stop running hooks after the first failure',
        default: false,
      })
      .option('show-diff-on-failure', {
        type: 'boolean',
        description: 'Print the changes made by hooks when the run fails',
        default: false,
      })
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to the config file (default: .hookrunrc)',
      })
      .example('$0', 'Run every hook on staged files')
      .example('$0 run --all-files', 'Run every hook on every tracked file')
      .example('$0 run check-json --files a.json b.json', 'Run one hook on two files')
      .example('SKIP=check-json $0', 'Skip a hook');
  },
  handler: async (argv) => {
    process.exit(await executeRun(argv));
  },
};
