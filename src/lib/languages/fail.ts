import type { Language } from './types.js';

/**
 * Hooks that always fail, printing their entry as the message.
 * Used to forbid files by name or type.
 */
export const fail: Language = {
  name: 'fail',

  async install(): Promise<void> {
    // Nothing to provision
  },

  async run(hook, filenames) {
    const message = `${hook.entry}\n\n${filenames.map((f) => `${f}\n`).join('')}`;
    return { code: 1, output: Buffer.from(message, 'utf8') };
  },
};
