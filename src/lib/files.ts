/**
 * Master file list for a run
 */

import path from 'path';
import * as git from './git.js';
import { FilenameFilter } from './hooks/filters.js';

export interface CollectFilesOptions {
  /** Repository root */
  repoRoot: string;
  /** Explicit files, relative to `cwd` */
  files?: readonly string[];
  /** Use every tracked file instead of the staged ones */
  allFiles?: boolean;
  /** Directory explicit files are relative to (default: process.cwd()) */
  cwd?: string;
  /** Global include pattern */
  include?: string;
  /** Global exclude pattern */
  exclude?: string;
}

/**
 * Make an explicit path relative to the repository root, with forward slashes
 */
export function toRepoPath(file: string, repoRoot: string, cwd: string = process.cwd()): string {
  const relative = path.relative(repoRoot, path.resolve(cwd, file));
  return relative.split(path.sep).join('/');
}

/**
 * Collect the files hooks are run against: explicit files, every tracked
 * file, or the staged files, narrowed by the global patterns.
 */
export async function collectFiles(options: CollectFilesOptions): Promise<string[]> {
  const { repoRoot } = options;
  let filenames: string[];

  if (options.files && options.files.length > 0) {
    const seen = new Set<string>();
    filenames = [];
    for (const file of options.files) {
      const repoPath = toRepoPath(file, repoRoot, options.cwd);
      if (!seen.has(repoPath)) {
        seen.add(repoPath);
        filenames.push(repoPath);
      }
    }
  } else if (options.allFiles) {
    filenames = await git.getAllFiles(repoRoot);
  } else {
    filenames = await git.getStagedFiles(repoRoot);
  }

  const filter = new FilenameFilter(options.include, options.exclude);
  return filenames.filter((filename) => filter.matches(filename));
}
