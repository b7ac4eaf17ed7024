/**
 * Hook Run Sequencer
 *
 * Runs hooks one at a time in configured order. Each hook sees the working
 * tree left by the hooks before it; a hook that changes the working-tree
 * diff is reported as failed even when it exits 0.
 */

import * as git from '../git.js';
import * as colors from '../colors.js';
import { HOOK_ENV } from '../constants.js';
import { logger } from '../logger.js';
import { classifierFor, filterFilenames, type Classifier } from './filters.js';
import { combineOutputs, runByBatch } from './batch.js';
import { shuffle } from './partition.js';
import { calculateColumns, StatusPrinter } from './status.js';
import type { HookEnv } from '../languages/types.js';
import type { Hook, HookOutcome, RunHooksOptions, RunResult } from './types.js';

export interface HookRunContext {
  filenames: readonly string[];
  skips: readonly string[];
  env: HookEnv;
  verbose: boolean;
  cwd?: string;
  classify: Classifier;
  printer: StatusPrinter;
}

function isSkipped(hook: Hook, skips: readonly string[]): boolean {
  return skips.includes(hook.id) || (hook.alias !== '' && skips.includes(hook.alias));
}

function skippedOutcome(hook: Hook, skipReason: HookOutcome['skipReason']): HookOutcome {
  return {
    hook,
    status: 'skipped',
    skipReason,
    code: 0,
    modified: false,
    duration: 0,
    output: Buffer.alloc(0),
    filenames: [],
  };
}

/**
 * Run one hook against the master file list.
 * Returns its outcome and the diff snapshot taken after it ran.
 */
export async function runHook(
  hook: Hook,
  context: HookRunContext,
  diff: Buffer
): Promise<{ outcome: HookOutcome; diff: Buffer }> {
  const { printer } = context;

  if (isSkipped(hook, context.skips)) {
    printer.skipped(hook, 'skip-list');
    return { outcome: skippedOutcome(hook, 'skip-list'), diff };
  }

  const filenames = filterFilenames(hook, context.filenames, context.classify);

  if (filenames.length === 0 && !hook.alwaysRun) {
    printer.skipped(hook, 'no-files');
    return { outcome: skippedOutcome(hook, 'no-files'), diff };
  }

  printer.started(hook);
  const startTime = Date.now();

  const args = hook.passFilenames ? shuffle(filenames) : [];
  const results = await runByBatch(hook, args, (batch) =>
    hook.language.run(hook, batch, context.env)
  );
  const { code, output } = combineOutputs(results);

  const duration = Date.now() - startTime;

  const newDiff = await git.getDiff(context.cwd);
  const modified = !diff.equals(newDiff);
  const success = code === 0 && !modified;

  const outcome: HookOutcome = {
    hook,
    status: success ? 'passed' : 'failed',
    code,
    modified,
    duration,
    output,
    filenames,
  };
  printer.finished(outcome, context.verbose);

  return { outcome, diff: newDiff };
}

/**
 * Run every hook in order.
 *
 * Hook failures are results; git or process failures reject.
 */
export async function runHooks(hooks: readonly Hook[], options: RunHooksOptions): Promise<RunResult> {
  const printer = new StatusPrinter(
    options.stdout ?? process.stdout,
    calculateColumns(hooks),
    options.cwd
  );
  const context: HookRunContext = {
    filenames: options.filenames,
    skips: options.skips ?? [],
    env: options.env ?? HOOK_ENV,
    verbose: options.verbose ?? false,
    cwd: options.cwd,
    classify: classifierFor(options.cwd),
    printer,
  };

  const outcomes: HookOutcome[] = [];
  let success = true;

  let diff = await git.getDiff(options.cwd);
  // Hooks must run in serial: each one sees the previous one's changes
  for (const hook of hooks) {
    const result = await runHook(hook, context, diff);
    outcomes.push(result.outcome);
    diff = result.diff;

    success = success && result.outcome.status !== 'failed';
    if (!success && (options.failFast || hook.failFast)) {
      logger.debug(`Stopping after \`${hook.id}\` failed (fail fast)`);
      break;
    }
  }

  if (!success && options.showDiffOnFailure) {
    printer.writeln('All changes made by hooks:');
    const color = colors.isColorEnabled() ? 'always' : 'never';
    const changes = await git.execAsync(['--no-pager', 'diff', '--no-ext-diff', `--color=${color}`], {
      cwd: options.cwd,
    });
    printer.write(changes.toString('utf8'));
  }

  return { success, outcomes };
}
