import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';

vi.mock('./git.js', () => ({
  getStagedFiles: vi.fn(),
  getAllFiles: vi.fn(),
}));

import * as git from './git.js';
import { collectFiles, toRepoPath } from './files.js';
import { parseSkips } from './run.js';

const mockGetStagedFiles = vi.mocked(git.getStagedFiles);
const mockGetAllFiles = vi.mocked(git.getAllFiles);

describe('toRepoPath', () => {
  const root = path.resolve('/repo');

  it('makes paths relative to the repository root', () => {
    expect(toRepoPath('a.txt', root, path.join(root, 'docs'))).toBe('docs/a.txt');
    expect(toRepoPath('../b.txt', root, path.join(root, 'docs'))).toBe('b.txt');
  });

  it('accepts absolute paths', () => {
    expect(toRepoPath(path.join(root, 'src', 'c.ts'), root, root)).toBe('src/c.ts');
  });
});

describe('collectFiles', () => {
  const root = path.resolve('/repo');

  beforeEach(() => {
    vi.resetAllMocks();
    mockGetStagedFiles.mockResolvedValue(['a.txt', 'vendor/b.txt', 'c.json']);
    mockGetAllFiles.mockResolvedValue(['README.md', 'a.txt']);
  });

  it('uses staged files by default', async () => {
    expect(await collectFiles({ repoRoot: root })).toEqual(['a.txt', 'vendor/b.txt', 'c.json']);
    expect(mockGetStagedFiles).toHaveBeenCalledWith(root);
    expect(mockGetAllFiles).not.toHaveBeenCalled();
  });

  it('uses every tracked file with allFiles', async () => {
    expect(await collectFiles({ repoRoot: root, allFiles: true })).toEqual(['README.md', 'a.txt']);
    expect(mockGetStagedFiles).not.toHaveBeenCalled();
  });

  it('uses explicit files without asking git, dropping duplicates', async () => {
    const files = await collectFiles({
      repoRoot: root,
      cwd: root,
      files: ['a.txt', './a.txt', 'docs/x.md'],
      allFiles: true,
    });
    expect(files).toEqual(['a.txt', 'docs/x.md']);
    expect(mockGetAllFiles).not.toHaveBeenCalled();
  });

  it('applies the global patterns', async () => {
    expect(
      await collectFiles({ repoRoot: root, include: '\\.(txt|json)$', exclude: '^vendor/' })
    ).toEqual(['a.txt', 'c.json']);
  });
});

describe('parseSkips', () => {
  it('splits comma-separated ids and trims them', () => {
    expect(parseSkips('lint, check-json ,,')).toEqual(['lint', 'check-json']);
  });

  it('returns nothing when unset or empty', () => {
    expect(parseSkips(undefined)).toEqual([]);
    expect(parseSkips('')).toEqual([]);
  });
});
