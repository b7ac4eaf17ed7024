/**
 * Status line output
 *
 * ```
 * trim trailing whitespace.................................................Failed
 * - hook id: trailing-whitespace
 * - exit code: 1
 * - files were modified by this hook
 *   Fixing a.txt
 * check json...........................................(no files to check)Skipped
 * ```
 */

import fs from 'fs';
import path from 'path';
import * as colors from '../colors.js';
import { FAILED, MIN_COLUMNS, NO_FILES, PASSED, SKIPPED } from '../constants.js';
import type { Hook, HookOutcome, OutputStream } from './types.js';

/**
 * Width of every status line: wide enough for the longest name followed by
 * the "(no files to check)Skipped" suffix, and never narrower than 80.
 */
export function calculateColumns(hooks: readonly Pick<Hook, 'name'>[]): number {
  const nameLength = Math.max(0, ...hooks.map((hook) => colors.displayWidth(hook.name)));
  return Math.max(MIN_COLUMNS, nameLength + 3 + NO_FILES.length + 1 + SKIPPED.length);
}

/**
 * `start`, dot padding, `postfix` and the colored `endMsg`, `columns - 1` wide
 */
export function statusLine(
  start: string,
  columns: number,
  endMsg: string,
  endColor: (text: string) => string,
  postfix = ''
): string {
  const dots = Math.max(0, columns - colors.displayWidth(start) - endMsg.length - postfix.length - 1);
  return `${start}${'.'.repeat(dots)}${postfix}${endColor(endMsg)}`;
}

/**
 * Name and dots printed before a hook starts; the result label completes the line
 */
export function pendingLine(name: string, columns: number): string {
  const dots = Math.max(0, columns - colors.displayWidth(name) - PASSED.length - 1);
  return `${name}${'.'.repeat(dots)}`;
}

/**
 * Indent every non-empty line by two spaces
 */
export function indent(text: string, prefix = '  '): string {
  return text
    .split('\n')
    .map((line) => (line.trim() ? `${prefix}${line}` : line))
    .join('\n');
}

/**
 * Trim ASCII whitespace from both ends of a buffer
 */
export function trimAscii(output: Buffer): Buffer {
  const isSpace = (byte: number | undefined): boolean =>
    byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0c || byte === 0x0b;
  let start = 0;
  let end = output.length;
  while (start < end && isSpace(output[start])) start++;
  while (end > start && isSpace(output[end - 1])) end--;
  return output.subarray(start, end);
}

export class StatusPrinter {
  constructor(
    private readonly stream: OutputStream,
    readonly columns: number,
    private readonly cwd?: string
  ) {}

  write(text: string): void {
    this.stream.write(text);
  }

  writeln(text = ''): void {
    this.stream.write(`${text}\n`);
  }

  skipped(hook: Hook, reason: HookOutcome['skipReason']): void {
    if (reason === 'no-files') {
      this.writeln(statusLine(hook.name, this.columns, SKIPPED, colors.blackOnCyan, NO_FILES));
    } else {
      this.writeln(statusLine(hook.name, this.columns, SKIPPED, colors.blackOnYellow));
    }
  }

  started(hook: Hook): void {
    this.write(pendingLine(hook.name, this.columns));
  }

  /**
   * Finish the pending line and print details when the hook failed or
   * verbose output was requested
   */
  finished(outcome: HookOutcome, verbose: boolean): void {
    const { hook } = outcome;
    const failed = outcome.status === 'failed';
    this.writeln(failed ? colors.onRed(FAILED) : colors.onGreen(PASSED));

    const showDuration = verbose || hook.verbose;
    if (!showDuration && !failed) {
      return;
    }

    this.writeln(colors.dim(`- hook id: ${hook.id}`));
    if (showDuration) {
      this.writeln(colors.dim(`- duration: ${(outcome.duration / 1000).toFixed(2)}s`));
    }
    if (outcome.code !== 0) {
      this.writeln(colors.dim(`- exit code: ${outcome.code}`));
    }
    if (outcome.modified) {
      this.writeln(colors.dim('- files were modified by this hook'));
    }

    const output = trimAscii(outcome.output);
    if (output.length === 0) {
      return;
    }
    if (hook.logFile) {
      const logPath = this.cwd ? path.resolve(this.cwd, hook.logFile) : hook.logFile;
      fs.appendFileSync(logPath, Buffer.concat([output, Buffer.from('\n')]));
    } else {
      this.writeln(colors.dim(indent(output.toString('utf8'))));
    }
  }
}
