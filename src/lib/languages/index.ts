/**
 * Language runners
 */

import { fail } from './fail.js';
import { script } from './script.js';
import { system } from './system.js';
import type { Language, LanguageName } from './types.js';

export type { Language, LanguageName, RunOutput, HookEnv } from './types.js';
export { LANGUAGE_NAMES, isLanguageName } from './types.js';
export { buildShellCommand, runMerged, shellQuote } from './process.js';

const LANGUAGES: Readonly<Record<LanguageName, Language>> = {
  system,
  script,
  fail,
};

/**
 * Resolve the runner for a language
 */
export function getLanguage(name: LanguageName): Language {
  return LANGUAGES[name];
}
