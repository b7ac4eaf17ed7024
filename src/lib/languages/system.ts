import { buildShellCommand, runMerged } from './process.js';
import type { Language } from './types.js';

/**
 * Hooks whose entry is a command already available on the system
 */
export const system: Language = {
  name: 'system',

  async install(): Promise<void> {
    // Nothing to provision
  },

  run(hook, filenames, env) {
    const command = buildShellCommand(hook.entry, [...hook.args, ...filenames]);
    return runMerged(hook.id, command, { cwd: hook.repoPath, env });
  },
};
