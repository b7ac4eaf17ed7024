/**
 * Batch Execution Engine
 *
 * Runs a hook's batches concurrently behind a semaphore. Every batch runs to
 * completion even when a sibling fails; results come back in partition order.
 */

import { logger } from '../logger.js';
import { partitions, targetConcurrency, type PartitionOptions } from './partition.js';
import type { Hook } from './types.js';
import type { RunOutput } from '../languages/types.js';

/**
 * Counting semaphore. Waiters are served first come, first served.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }

  /**
   * Run `task` while holding a permit
   */
  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

export interface RunByBatchOptions extends PartitionOptions {
  /** Override the hook's concurrency (default: targetConcurrency(hook.requireSerial)) */
  concurrency?: number;
}

/**
 * Partition `filenames` and run `run` once per batch.
 *
 * Resolves with one result per batch in partition order. When any batch
 * rejects, the remaining batches still finish and the first rejection in
 * partition order is rethrown.
 */
export async function runByBatch<T>(
  hook: Pick<Hook, 'id' | 'entry' | 'args' | 'requireSerial'>,
  filenames: readonly string[],
  run: (batch: string[], index: number) => Promise<T>,
  options: RunByBatchOptions = {}
): Promise<T[]> {
  const target = options.concurrency ?? targetConcurrency(hook.requireSerial);
  const batches = partitions(hook, filenames, target, options);
  const concurrency = Math.min(target, batches.length);
  const semaphore = new Semaphore(concurrency);

  logger.trace(
    `Running ${hook.id}: total_files=${filenames.length} partitions=${batches.length} concurrency=${concurrency}`
  );

  const settled = await Promise.allSettled(
    batches.map((batch, index) => semaphore.use(() => run(batch, index)))
  );

  const results: T[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}

/**
 * Fold batch results into one: the first non-zero exit code in partition
 * order (0 when every batch passed) and the outputs concatenated in order.
 */
export function combineOutputs(results: readonly RunOutput[]): RunOutput {
  const failed = results.find((r) => r.code !== 0);
  return {
    code: failed ? failed.code : 0,
    output: Buffer.concat(results.map((r) => r.output)),
  };
}
