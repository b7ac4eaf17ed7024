/**
 * The `run` command: load config, collect files, isolate the working tree
 * for staged runs and run every hook.
 */

import path from 'path';
import * as git from './git.js';
import { loadConfig } from './config.js';
import { collectFiles } from './files.js';
import { ConfigurationError } from './errors.js';
import { ENV_SKIP, HOOK_ENV } from './constants.js';
import { logger } from './logger.js';
import { processCleanup, type CleanupRegistry } from './cleanup.js';
import { runHooks } from './hooks/runner.js';
import { WorkTreeKeeper } from './hooks/work-tree.js';
import type { OutputStream, RunResult } from './hooks/types.js';

export interface RunOptions {
  /** Directory the command was started in (default: process.cwd()) */
  cwd?: string;
  /** Run only the hook with this id or alias */
  hookId?: string;
  /** Run against every tracked file */
  allFiles?: boolean;
  /** Run against these files */
  files?: string[];
  failFast?: boolean;
  showDiffOnFailure?: boolean;
  verbose?: boolean;
  /** Config file path, relative to the repository root */
  config?: string;
  /** Process environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory for saved patches */
  patchDir?: string;
  cleanup?: CleanupRegistry;
  stdout?: OutputStream;
}

/**
 * Hook ids and aliases listed in `SKIP`
 */
export function parseSkips(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

/**
 * Run the configured hooks. Hook failures are reported in the result;
 * configuration, git and process errors reject.
 */
export async function run(options: RunOptions = {}): Promise<RunResult> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const stdout = options.stdout ?? process.stdout;
  const repoRoot = git.getRepoRoot(cwd);
  const config = loadConfig(repoRoot, options.config);

  let hooks = config.hooks;
  if (options.hookId) {
    const { hookId } = options;
    hooks = hooks.filter((hook) => hook.id === hookId || hook.alias === hookId);
    if (hooks.length === 0) {
      throw new ConfigurationError(`No hook found for id \`${hookId}\``, {
        configFile: config.configPath,
      });
    }
  }

  const stagedRun = !options.allFiles && !(options.files && options.files.length > 0);
  if (stagedRun) {
    const configRelative = path.relative(repoRoot, config.configPath);
    if (await git.hasUnstagedChanges([configRelative], repoRoot)) {
      throw new ConfigurationError(
        `Your hookrun configuration is unstaged.\n\`git add ${configRelative}\` to fix this.`,
        { configFile: config.configPath }
      );
    }
  }

  const skips = parseSkips(env[ENV_SKIP]);
  if (skips.length > 0) {
    logger.debug(`Skipping hooks: ${skips.join(', ')}`);
  }

  for (const hook of hooks) {
    await hook.language.install(hook);
  }

  const keeper = stagedRun
    ? await WorkTreeKeeper.clean({
        cwd: repoRoot,
        patchDir: options.patchDir,
        cleanup: options.cleanup ?? processCleanup,
        notify: (message) => stdout.write(`${message}\n`),
      })
    : null;

  try {
    // Collected after isolation: intent-to-add files are out of the index by then
    const filenames = await collectFiles({
      repoRoot,
      files: options.files,
      allFiles: options.allFiles,
      cwd,
      include: config.files,
      exclude: config.exclude,
    });
    logger.debug(`Running ${hooks.length} hook(s) against ${filenames.length} file(s)`);

    return await runHooks(hooks, {
      filenames,
      skips,
      env: HOOK_ENV,
      failFast: options.failFast || config.failFast,
      showDiffOnFailure: options.showDiffOnFailure,
      verbose: options.verbose,
      cwd: repoRoot,
      stdout,
    });
  } finally {
    keeper?.restore();
  }
}
