/**
 * Language runner types
 *
 * A language knows how to prepare a hook's environment and how to run one
 * batch of it. The set of languages is closed: see LANGUAGE_NAMES.
 */

import type { Hook } from '../hooks/types.js';

/**
 * Supported hook languages
 */
export type LanguageName = 'system' | 'script' | 'fail';

/**
 * All valid language names as an array for iteration and validation
 */
export const LANGUAGE_NAMES: readonly LanguageName[] = ['system', 'script', 'fail'];

/**
 * Exit status and combined stdout/stderr of one batch
 */
export interface RunOutput {
  code: number;
  output: Buffer;
}

/**
 * Environment variables shared by every batch of a run
 */
export type HookEnv = Readonly<Record<string, string>>;

export interface Language {
  readonly name: LanguageName;

  /**
   * Prepare the hook's environment. Idempotent.
   */
  install(hook: Hook): Promise<void>;

  /**
   * Run one batch. `filenames` is empty when the hook does not take filenames.
   */
  run(hook: Hook, filenames: readonly string[], env: HookEnv): Promise<RunOutput>;
}

export function isLanguageName(value: string): value is LanguageName {
  return LANGUAGE_NAMES.some((name) => name === value);
}
