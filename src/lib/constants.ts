/**
 * Centralized constants and defaults for hookrun
 */

import os from 'os';
import path from 'path';

/**
 * Config file names to look for (in order of priority)
 */
export const CONFIG_FILE_NAMES = ['.hookrunrc', '.hookrunrc.json'];

/**
 * Environment variable naming hook ids/aliases to skip (comma-separated)
 */
export const ENV_SKIP = 'SKIP';

/**
 * Environment variable that forces every hook to run its batches serially
 */
export const ENV_NO_CONCURRENCY = 'HOOKRUN_NO_CONCURRENCY';

/**
 * Environment variable overriding the data directory (stashed patches)
 */
export const ENV_HOME = 'HOOKRUN_HOME';

/**
 * Environment variable for the log level
 */
export const ENV_LOG_LEVEL = 'HOOKRUN_LOG_LEVEL';

/**
 * Variables exported to every hook invocation.
 * Hooks use HOOKRUN=1 to detect they run under this tool.
 */
export const HOOK_ENV: Readonly<Record<string, string>> = Object.freeze({ HOOKRUN: '1' });

/**
 * Status labels
 */
export const PASSED = 'Passed';
export const FAILED = 'Failed';
export const SKIPPED = 'Skipped';
export const NO_FILES = '(no files to check)';

/**
 * Minimum width of a status line
 */
export const MIN_COLUMNS = 80;

/**
 * Seed for the filename shuffle. Fixed so batches are reproducible across runs.
 */
export const SHUFFLE_SEED = 1542676187;

/**
 * Smallest batch size used when splitting files across concurrent batches
 */
export const MIN_BATCH_SIZE = 4;

/**
 * Command line length ceiling used when partitioning filenames.
 * Kept well below the real OS limits to leave room for the environment.
 */
export const MAX_CLI_LENGTH = process.platform === 'win32' ? (1 << 15) - 2048 : 1 << 12;

/**
 * Consola numeric log levels
 */
export const LogLevel = {
  SILENT: -999,
  ERROR: 0,
  WARN: 1,
  INFO: 3,
  DEBUG: 4,
  TRACE: 5,
} as const;

/**
 * Data directory holding stashed non-staged patches.
 * Honors HOOKRUN_HOME, then XDG_CACHE_HOME, then ~/.cache.
 */
export function getDataDir(): string {
  const override = process.env[ENV_HOME];
  if (override) {
    return override;
  }
  const cacheHome = process.env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(cacheHome, 'hookrun');
}
