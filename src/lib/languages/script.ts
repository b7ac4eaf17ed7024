import fs from 'fs';
import path from 'path';
import { RunnerError } from '../errors.js';
import { buildShellCommand, runMerged, shellQuote } from './process.js';
import type { Language } from './types.js';
import type { Hook } from '../hooks/types.js';

/**
 * Split `entry` into the script path (first word) and the rest of the line
 */
function splitEntry(entry: string): { script: string; rest: string } {
  const trimmed = entry.trim();
  const match = /^(\S+)(.*)$/s.exec(trimmed);
  if (!match) {
    return { script: trimmed, rest: '' };
  }
  return { script: match[1], rest: match[2] };
}

/**
 * Absolute path of the script a hook runs
 */
export function resolveScript(hook: Hook): string {
  const { script } = splitEntry(hook.entry);
  return path.isAbsolute(script) ? script : path.join(hook.repoPath, script);
}

/**
 * Hooks whose entry is a script inside the hook repository
 */
export const script: Language = {
  name: 'script',

  async install(hook) {
    const scriptPath = resolveScript(hook);
    if (!fs.existsSync(scriptPath)) {
      throw new RunnerError(`Script not found for hook \`${hook.id}\`: ${scriptPath}`, {
        hookId: hook.id,
      });
    }
  },

  run(hook, filenames, env) {
    const { rest } = splitEntry(hook.entry);
    const entry = `${shellQuote(resolveScript(hook))}${rest}`;
    const command = buildShellCommand(entry, [...hook.args, ...filenames]);
    return runMerged(hook.id, command, { cwd: hook.repoPath, env });
  },
};
