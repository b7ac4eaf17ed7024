import fs from 'fs';
import path from 'path';
import os from 'os';
import { execSync } from 'child_process';

/**
 * A throwaway git repository under the OS temp directory
 */
export interface TestRepo {
  /** Temp directory containing the repository and saved patches */
  tempDir: string;
  /** Repository root */
  repoDir: string;
  /** Directory for saved patches */
  patchDir: string;
  /** Run a git command in the repository, returning trimmed stdout */
  git: (command: string) => string;
  /** Write a file relative to the repository root */
  write: (file: string, content: string | Buffer) => void;
  /** Read a file relative to the repository root */
  read: (file: string) => string;
  /** Remove the temp directory */
  cleanup: () => void;
}

/**
 * Create a repository with one commit containing README.md
 */
export function createTestRepo(prefix = 'hookrun-test-'): TestRepo {
  const tempDir = fs.realpathSync.native(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
  const repoDir = path.join(tempDir, 'repo');
  const patchDir = path.join(tempDir, 'patches');
  fs.mkdirSync(repoDir);

  const git = (command: string): string =>
    execSync(`git ${command}`, { cwd: repoDir, encoding: 'utf8', stdio: 'pipe' }).trim();

  const write = (file: string, content: string | Buffer): void => {
    const fullPath = path.join(repoDir, file);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  };

  git('init');
  git('config user.email "test@test.com"');
  git('config user.name "Test User"');
  git('config commit.gpgsign false');
  git('config core.autocrlf false');

  write('README.md', '# Test\n');
  git('add .');
  git('commit -m "Initial commit"');

  return {
    tempDir,
    repoDir,
    patchDir,
    git,
    write,
    read: (file) => fs.readFileSync(path.join(repoDir, file), 'utf8'),
    cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }),
  };
}
