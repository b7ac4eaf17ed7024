/**
 * Batch partitioning
 *
 * Splits a hook's filenames into batches that respect both a command line
 * length ceiling and a per-batch count that shrinks as concurrency grows.
 * Input order is preserved within and across batches.
 */

import os from 'os';
import {
  ENV_NO_CONCURRENCY,
  MAX_CLI_LENGTH,
  MIN_BATCH_SIZE,
  SHUFFLE_SEED,
} from '../constants.js';
import type { Hook } from './types.js';

export interface PartitionOptions {
  /** Command line length ceiling in bytes (default: MAX_CLI_LENGTH) */
  maxCliLength?: number;
}

/**
 * Number of batches a hook may run at once
 */
export function targetConcurrency(serial: boolean): number {
  if (serial || process.env[ENV_NO_CONCURRENCY] !== undefined) {
    return 1;
  }
  return Math.max(1, os.availableParallelism());
}

/**
 * Bytes taken by the hook's entry and fixed arguments, one separator per argument
 */
export function commandLength(hook: Pick<Hook, 'entry' | 'args'>): number {
  const argBytes = hook.args.reduce((sum, arg) => sum + Buffer.byteLength(arg), 0);
  return Buffer.byteLength(hook.entry) + argBytes + hook.args.length;
}

/**
 * Split filenames into batches.
 *
 * No filenames still yields one empty batch so the hook runs once.
 */
export function partitions(
  hook: Pick<Hook, 'entry' | 'args'>,
  filenames: readonly string[],
  concurrency: number,
  options: PartitionOptions = {}
): string[][] {
  if (filenames.length === 0) {
    return [[]];
  }

  const maxPerBatch = Math.max(MIN_BATCH_SIZE, Math.ceil(filenames.length / Math.max(1, concurrency)));
  const maxCliLength = options.maxCliLength ?? MAX_CLI_LENGTH;
  const baseLength = commandLength(hook) + 1;

  const batches: string[][] = [];
  let current: string[] = [];
  let currentLength = baseLength;

  for (const filename of filenames) {
    const length = Buffer.byteLength(filename) + 1;
    // An over-long filename still gets a batch of its own
    if (current.length > 0 && (currentLength + length > maxCliLength || current.length >= maxPerBatch)) {
      batches.push(current);
      current = [];
      currentLength = baseLength;
    }
    current.push(filename);
    currentLength += length;
  }

  if (current.length > 0) {
    batches.push(current);
  }

  return batches;
}

/**
 * mulberry32: small seeded PRNG returning floats in [0, 1)
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Shuffle filenames so large files spread evenly over batches.
 * The seed is fixed: the same input always yields the same order.
 */
export function shuffle<T>(items: readonly T[], seed: number = SHUFFLE_SEED): T[] {
  const result = [...items];
  const random = mulberry32(seed);
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
