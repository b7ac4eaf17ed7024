/**
 * Process-wide cleanup on interrupt
 *
 * Callbacks registered here run synchronously when the process receives
 * SIGINT/SIGTERM/SIGHUP or exits with work still registered. A callback
 * runs at most once: it is removed from the registry before it is invoked.
 */

import { logger } from './logger.js';

export type CleanupFn = () => void;

const SIGNALS: ReadonlyArray<{ signal: NodeJS.Signals; number: number }> = [
  { signal: 'SIGINT', number: 2 },
  { signal: 'SIGTERM', number: 15 },
  { signal: 'SIGHUP', number: 1 },
];

export class CleanupRegistry {
  private callbacks = new Map<number, CleanupFn>();
  private nextId = 0;

  /**
   * Register a callback. Returns a function that unregisters it.
   */
  add(fn: CleanupFn): () => void {
    const id = this.nextId++;
    this.callbacks.set(id, fn);
    return () => {
      this.callbacks.delete(id);
    };
  }

  get size(): number {
    return this.callbacks.size;
  }

  /**
   * Run and remove every registered callback, most recent first.
   * A throwing callback does not prevent the others from running.
   */
  runAll(): void {
    const pending = [...this.callbacks.entries()].reverse();
    this.callbacks.clear();
    for (const [, fn] of pending) {
      try {
        fn();
      } catch (err) {
        logger.warn('Cleanup failed:', err);
      }
    }
  }
}

/**
 * The registry wired to process signals by installSignalHandlers()
 */
export const processCleanup = new CleanupRegistry();

let handlersInstalled = false;

/**
 * Install signal and exit handlers that drain `registry`.
 * On a signal the process exits with 128 + the signal number.
 */
export function installSignalHandlers(registry: CleanupRegistry = processCleanup): void {
  if (handlersInstalled) {
    return;
  }
  handlersInstalled = true;

  for (const { signal, number } of SIGNALS) {
    process.on(signal, () => {
      logger.warn(`Received ${signal}, restoring working tree before exit`);
      registry.runAll();
      process.exit(128 + number);
    });
  }

  // Must be synchronous: Node.js does not process async work after 'exit'
  process.on('exit', () => {
    registry.runAll();
  });
}
