/**
 * Working-tree isolation
 *
 * While a WorkTreeKeeper is active the working tree holds exactly what is
 * staged: non-staged edits are saved to a patch and removed, and
 * intent-to-add entries are dropped from the index. restore() puts both
 * back, exactly once, whether it is reached through the caller's `finally`
 * or through the interrupt handler.
 */

import fs from 'fs';
import path from 'path';
import * as git from '../git.js';
import { WorkTreeError } from '../errors.js';
import { logger } from '../logger.js';
import { processCleanup, type CleanupRegistry } from '../cleanup.js';
import { getDataDir } from '../constants.js';

export type KeeperState = 'active' | 'restored';

export interface WorkTreeKeeperOptions {
  /** Repository root */
  cwd?: string;
  /** Directory for saved patches (default: the data directory) */
  patchDir?: string;
  /** Registry that restores the working tree on interrupt */
  cleanup?: CleanupRegistry;
  /** Receives operator notices such as the saved patch location */
  notify?: (message: string) => void;
}

/** Held from the start of clean() until restore(); one per process */
let slotHeld = false;

export class WorkTreeKeeper {
  private state: KeeperState = 'active';
  private unregister: () => void = () => {};

  private constructor(
    private readonly cwd: string | undefined,
    readonly intentToAdd: readonly string[],
    readonly patchFile: string | null
  ) {}

  /**
   * Clear intent-to-add entries and non-staged changes.
   * The returned keeper must be restored by the caller.
   */
  static async clean(options: WorkTreeKeeperOptions = {}): Promise<WorkTreeKeeper> {
    if (slotHeld) {
      throw new WorkTreeError('Another run is already holding the working tree');
    }
    // Claimed before the first await so overlapping calls cannot both pass
    slotHeld = true;
    const { cwd } = options;
    const notify = options.notify ?? ((message: string) => logger.info(message));

    let intentToAdd: string[] = [];
    let patchFile: string | null = null;
    try {
      intentToAdd = await git.getIntentToAddFiles(cwd);
      if (intentToAdd.length > 0) {
        git.removeCached(intentToAdd, cwd);
      }

      const tree = await git.writeTree(cwd);
      const patch = await git.diffWorkingTreeToTree(tree, cwd);
      if (patch) {
        const patchDir = options.patchDir ?? getDataDir();
        fs.mkdirSync(patchDir, { recursive: true });
        patchFile = path.join(patchDir, `${Date.now()}-${process.pid}.patch`);
        fs.writeFileSync(patchFile, patch);
        notify(`Non-staged changes detected, saving to ${patchFile}`);
        git.checkoutWorkingTree(cwd);
      }
    } catch (error) {
      // Put back whatever was already taken away before giving up
      new WorkTreeKeeper(cwd, intentToAdd, patchFile).restoreAll();
      slotHeld = false;
      const message = error instanceof Error ? error.message : String(error);
      throw new WorkTreeError(`Failed to isolate the working tree: ${message}`);
    }

    const keeper = new WorkTreeKeeper(cwd, intentToAdd, patchFile);
    keeper.unregister = (options.cleanup ?? processCleanup).add(() => keeper.restore());
    return keeper;
  }

  get current(): KeeperState {
    return this.state;
  }

  /**
   * Bring back non-staged changes, then intent-to-add entries.
   * Later calls are no-ops. Failures are logged, never thrown.
   */
  restore(): void {
    if (this.state === 'restored') {
      return;
    }
    this.state = 'restored';
    this.unregister();
    slotHeld = false;
    this.restoreAll();
  }

  private restoreAll(): void {
    this.restoreWorkingTree();
    this.restoreIntentToAdd();
  }

  private restoreWorkingTree(): void {
    if (!this.patchFile) {
      return;
    }
    try {
      git.applyPatch(this.patchFile, { reverse: true, cwd: this.cwd });
    } catch (error) {
      logger.debug('Applying saved patch failed:', error);
      logger.warn('Stashed changes conflicted with hook auto-fixes... Rolling back fixes...');
      try {
        git.checkoutWorkingTree(this.cwd);
        git.applyPatch(this.patchFile, { reverse: true, cwd: this.cwd });
      } catch (retryError) {
        logger.error(
          `Failed to restore non-staged changes, they are saved in ${this.patchFile}:`,
          retryError
        );
        return;
      }
    }
    logger.info(`Restored changes from ${this.patchFile}`);
  }

  private restoreIntentToAdd(): void {
    if (this.intentToAdd.length === 0) {
      return;
    }
    try {
      git.addIntentToAdd([...this.intentToAdd], this.cwd);
    } catch (error) {
      logger.error('Failed to restore intent-to-add changes:', error);
    }
  }
}
