import { execFileSync, spawn, ExecFileSyncOptions } from 'child_process';
import path from 'path';
import { GitCommandError } from './errors.js';

/**
 * Raw result of a git invocation
 */
export interface GitResult {
  code: number;
  stdout: Buffer;
  stderr: string;
}

const MAX_BUFFER = 64 * 1024 * 1024;

function describe(args: string[]): string {
  return `git ${args.join(' ')}`;
}

/**
 * Split NUL-separated git output (`-z`) into paths
 */
export function splitNul(output: Buffer | string): string[] {
  return output.toString('utf8').split('\0').filter(Boolean);
}

/**
 * Execute a git command synchronously and return output
 */
export function exec(args: string[], options: { cwd?: string } = {}): string {
  const cmd = describe(args);
  const execOptions: ExecFileSyncOptions = {
    encoding: 'utf8',
    cwd: options.cwd,
    maxBuffer: MAX_BUFFER,
    stdio: 'pipe',
  };

  try {
    const result = execFileSync('git', args, execOptions);
    // Use trimEnd to preserve leading whitespace (significant in git status output)
    return result.toString().trimEnd();
  } catch (error) {
    const detail = error as { status?: number | null; stderr?: Buffer | string };
    const stderr = detail.stderr ? detail.stderr.toString() : undefined;
    throw new GitCommandError(`Git command failed: ${cmd}${stderr ? `\n${stderr.trim()}` : ''}`, {
      command: cmd,
      exitCode: detail.status ?? undefined,
      stderr,
    });
  }
}

/**
 * Spawn git asynchronously, collecting stdout as raw bytes.
 * Resolves with the exit code; rejects only when git cannot be started.
 */
export function spawnGit(args: string[], options: { cwd?: string } = {}): Promise<GitResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout.on('data', (data: Buffer) => stdout.push(data));
    proc.stderr.on('data', (data: Buffer) => stderr.push(data));

    proc.on('error', (err) => {
      reject(
        new GitCommandError(`Failed to run ${describe(args)}: ${err.message}`, {
          command: describe(args),
        })
      );
    });

    proc.on('close', (code) => {
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
}

/**
 * Like spawnGit, but a non-zero exit code throws GitCommandError
 */
export async function execAsync(args: string[], options: { cwd?: string } = {}): Promise<Buffer> {
  const result = await spawnGit(args, options);
  if (result.code !== 0) {
    const cmd = describe(args);
    throw new GitCommandError(`Git command failed: ${cmd}\n${result.stderr.trim()}`, {
      command: cmd,
      exitCode: result.code,
      stderr: result.stderr,
    });
  }
  return result.stdout;
}

/**
 * Get the root directory of the current git repository
 */
export function getRepoRoot(cwd?: string): string {
  const result = exec(['rev-parse', '--show-toplevel'], { cwd });
  // Normalize path for cross-platform compatibility
  return path.normalize(result);
}

/**
 * Snapshot of the full working-tree diff against the index.
 * Compared byte for byte to detect hooks that modify files.
 */
export function getDiff(cwd?: string): Promise<Buffer> {
  return execAsync(['diff', '--no-ext-diff', '--no-textconv', '--ignore-submodules'], { cwd });
}

/**
 * Get staged files (added, copied, modified, renamed, type-changed...)
 */
export async function getStagedFiles(cwd?: string): Promise<string[]> {
  const output = await execAsync(
    ['diff', '--staged', '--name-only', '--no-ext-diff', '-z', '--diff-filter=ACMRTUXB'],
    { cwd }
  );
  return splitNul(output);
}

/**
 * Get every file tracked in the index
 */
export async function getAllFiles(cwd?: string): Promise<string[]> {
  return splitNul(await execAsync(['ls-files', '-z'], { cwd }));
}

/**
 * Files marked with `git add --intent-to-add`: present in the index with no content
 */
export async function getIntentToAddFiles(cwd?: string): Promise<string[]> {
  const output = await execAsync(
    ['diff', '--no-ext-diff', '--ignore-submodules', '--diff-filter=A', '--name-only', '-z'],
    { cwd }
  );
  return splitNul(output);
}

/**
 * Check whether any of the paths has changes that are not staged
 */
export async function hasUnstagedChanges(paths: string[], cwd?: string): Promise<boolean> {
  const result = await spawnGit(['diff', '--quiet', '--no-ext-diff', '--', ...paths], { cwd });
  return result.code !== 0;
}

/**
 * Write the index to a tree object and return its id
 */
export async function writeTree(cwd?: string): Promise<string> {
  return (await execAsync(['write-tree'], { cwd })).toString('utf8').trim();
}

/**
 * Binary patch taking the working tree back to `tree`, or null when the
 * working tree already matches it.
 */
export async function diffWorkingTreeToTree(tree: string, cwd?: string): Promise<Buffer | null> {
  const args = [
    'diff-index',
    '--ignore-submodules',
    '--binary',
    '--exit-code',
    '--no-color',
    '--no-ext-diff',
    '-R',
    tree,
    '--',
  ];
  const result = await spawnGit(args, { cwd });
  if (result.code === 0) {
    return null;
  }
  if (result.code === 1 && result.stdout.length > 0) {
    return result.stdout;
  }
  const cmd = describe(args);
  throw new GitCommandError(`Git command failed: ${cmd}\n${result.stderr.trim()}`, {
    command: cmd,
    exitCode: result.code,
    stderr: result.stderr,
  });
}

/**
 * Remove paths from the index, keeping them on disk
 */
export function removeCached(paths: string[], cwd?: string): void {
  exec(['rm', '--cached', '--quiet', '--', ...paths], { cwd });
}

/**
 * Re-mark paths as intent-to-add
 */
export function addIntentToAdd(paths: string[], cwd?: string): void {
  exec(['add', '--intent-to-add', '--', ...paths], { cwd });
}

/**
 * Reset every working-tree file to its staged content
 */
export function checkoutWorkingTree(cwd?: string): void {
  exec(['-c', 'submodule.recurse=0', 'checkout', '--', '.'], { cwd });
}

/**
 * Apply a patch file to the working tree
 */
export function applyPatch(patchFile: string, options: { reverse?: boolean; cwd?: string } = {}): void {
  const args = ['apply', '--whitespace=nowarn'];
  if (options.reverse) {
    args.push('--reverse');
  }
  args.push(patchFile);
  exec(args, { cwd: options.cwd });
}
