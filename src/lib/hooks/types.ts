/**
 * Hook System Types
 *
 * Defines the resolved hook descriptor and the results of running hooks.
 */

import type { HookEnv, Language, LanguageName } from '../languages/types.js';

/**
 * A resolved hook, built once from configuration and never mutated
 */
export interface Hook {
  readonly id: string;
  /** Alternative id usable with SKIP */
  readonly alias: string;
  /** Display name for status lines */
  readonly name: string;

  /** Command (or script) to run */
  readonly entry: string;
  /** Fixed arguments placed between entry and filenames */
  readonly args: readonly string[];

  /** Include pattern (unanchored regex); undefined matches everything */
  readonly files?: string;
  /** Exclude pattern (unanchored regex) */
  readonly exclude?: string;
  /** Every tag must be present */
  readonly types: readonly string[];
  /** At least one tag must be present (when non-empty) */
  readonly typesOr: readonly string[];
  /** No tag may be present */
  readonly excludeTypes: readonly string[];

  /** Run even when no files match */
  readonly alwaysRun: boolean;
  /** Stop the run after this hook fails */
  readonly failFast: boolean;
  /** Run batches one at a time */
  readonly requireSerial: boolean;
  /** Append matching filenames to the command */
  readonly passFilenames: boolean;
  /** Print output even on success */
  readonly verbose: boolean;
  /** Append output to this file instead of printing it */
  readonly logFile?: string;

  readonly languageName: LanguageName;
  readonly language: Language;
  /** Directory the hook runs in; scripts resolve against it */
  readonly repoPath: string;
}

/**
 * Outcome status of a single hook
 */
export type HookStatus = 'passed' | 'failed' | 'skipped';

/**
 * Result of running (or skipping) one hook
 */
export interface HookOutcome {
  hook: Hook;
  status: HookStatus;
  /** Why a hook was skipped */
  skipReason?: 'skip-list' | 'no-files';
  /** Combined exit code of the hook's batches (0 when skipped) */
  code: number;
  /** Whether the working tree changed while the hook ran */
  modified: boolean;
  /** Duration in milliseconds */
  duration: number;
  /** Combined output of every batch in partition order */
  output: Buffer;
  /** Filenames the hook selected, before shuffling */
  filenames: string[];
}

/**
 * Result of a full run
 */
export interface RunResult {
  success: boolean;
  outcomes: HookOutcome[];
}

/**
 * Minimal writable used for status output
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Options for running a list of hooks
 */
export interface RunHooksOptions {
  /** Master file list, relative to the repository root */
  filenames: string[];
  /** Hook ids or aliases to skip */
  skips?: string[];
  /** Variables passed to every batch */
  env?: HookEnv;
  /** Stop after the first failing hook */
  failFast?: boolean;
  /** Print `git diff` when the run fails */
  showDiffOnFailure?: boolean;
  /** Print hook details even on success */
  verbose?: boolean;
  /** Repository root; git commands and relative paths resolve against it */
  cwd?: string;
  /** Destination for status lines (default: process.stdout) */
  stdout?: OutputStream;
}
