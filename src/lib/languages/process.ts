/**
 * Subprocess execution for language runners
 */

import { spawn } from 'child_process';
import { RunnerError } from '../errors.js';
import type { HookEnv, RunOutput } from './types.js';

export interface ShellCommand {
  file: string;
  args: string[];
  windowsVerbatimArguments?: boolean;
}

/**
 * Quote a single argument for /bin/sh
 */
export function shellQuote(arg: string): string {
  if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote a single argument for cmd.exe
 */
function cmdQuote(arg: string): string {
  if (arg !== '' && !/[\s"&|<>^]/.test(arg)) {
    return arg;
  }
  return `"${arg.replace(/"/g, '""')}"`;
}

/**
 * Build the shell invocation for `entry` followed by extra arguments.
 *
 * On POSIX the entry is interpreted by /bin/sh and the arguments are passed
 * positionally through "$@", so filenames are never re-parsed by the shell.
 */
export function buildShellCommand(entry: string, args: readonly string[]): ShellCommand {
  if (process.platform === 'win32') {
    const line = [entry, ...args.map(cmdQuote)].join(' ');
    return {
      file: process.env.ComSpec ?? 'cmd.exe',
      args: ['/d', '/s', '/c', `"${line}"`],
      windowsVerbatimArguments: true,
    };
  }
  return {
    file: '/bin/sh',
    args: ['-c', `${entry} "$@"`, entry, ...args],
  };
}

/**
 * Run a command, merging stderr into stdout in arrival order
 */
export function runMerged(
  hookId: string,
  command: ShellCommand,
  options: { cwd: string; env: HookEnv }
): Promise<RunOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command.file, command.args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsVerbatimArguments: command.windowsVerbatimArguments,
    });

    const chunks: Buffer[] = [];
    proc.stdout.on('data', (data: Buffer) => chunks.push(data));
    proc.stderr.on('data', (data: Buffer) => chunks.push(data));

    proc.on('error', (err) => {
      reject(new RunnerError(`Failed to run hook \`${hookId}\`: ${err.message}`, { hookId }));
    });

    proc.on('close', (code, signal) => {
      resolve({
        // Killed by a signal: report like a shell would
        code: code ?? (signal ? 128 : 1),
        output: Buffer.concat(chunks),
      });
    });
  });
}
