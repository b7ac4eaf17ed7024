/**
 * Hook System Module
 *
 * Selects files for each hook, splits them into batches, runs the batches
 * and reports one status line per hook.
 */

// Types
export type {
  Hook,
  HookStatus,
  HookOutcome,
  RunResult,
  OutputStream,
  RunHooksOptions,
} from './types.js';

// File selection
export { FilenameFilter, TagFilter, filterFilenames, classifierFor } from './filters.js';
export type { Classifier } from './filters.js';
export { tagsFromFilename, tagsFromShebang, tagsFromPath } from './identify.js';

// Batching
export { partitions, shuffle, targetConcurrency, commandLength } from './partition.js';
export type { PartitionOptions } from './partition.js';
export { Semaphore, runByBatch, combineOutputs } from './batch.js';
export type { RunByBatchOptions } from './batch.js';

// Running
export { runHook, runHooks } from './runner.js';
export type { HookRunContext } from './runner.js';
export { WorkTreeKeeper } from './work-tree.js';
export type { KeeperState, WorkTreeKeeperOptions } from './work-tree.js';
export { StatusPrinter, calculateColumns, statusLine } from './status.js';
