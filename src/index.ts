/**
 * hookrun - Run git hooks against staged files, in parallel batches
 *
 * @packageDocumentation
 */

// Export all library modules
export * as git from './lib/git.js';
export * as colors from './lib/colors.js';
export * as config from './lib/config.js';
export * as hooks from './lib/hooks/index.js';
export * as languages from './lib/languages/index.js';

export { run, parseSkips } from './lib/run.js';
export { collectFiles } from './lib/files.js';
export { CleanupRegistry, processCleanup, installSignalHandlers } from './lib/cleanup.js';
export {
  HookRunError,
  GitCommandError,
  ConfigurationError,
  WorkTreeError,
  RunnerError,
  isHookRunError,
} from './lib/errors.js';

// Export key types
export type { RunOptions } from './lib/run.js';
export type { CollectFilesOptions } from './lib/files.js';
export type { HookConfig, HookrunConfig, ResolvedConfig } from './lib/config.js';
export type { Hook, HookOutcome, RunResult } from './lib/hooks/types.js';
export type { Language, LanguageName, RunOutput } from './lib/languages/types.js';
