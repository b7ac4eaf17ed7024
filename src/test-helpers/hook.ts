import { getLanguage } from '../lib/languages/index.js';
import type { Hook } from '../lib/hooks/types.js';

/**
 * Resolved hook with defaults matching an entry that only sets id and entry
 */
export function makeHook(overrides: Partial<Hook> = {}): Hook {
  const languageName = overrides.languageName ?? 'system';
  const id = overrides.id ?? 'test-hook';
  return {
    id,
    alias: '',
    name: overrides.name ?? id,
    entry: 'true',
    args: [],
    files: '',
    exclude: '^$',
    types: ['file'],
    typesOr: [],
    excludeTypes: [],
    alwaysRun: false,
    failFast: false,
    requireSerial: false,
    passFilenames: true,
    verbose: false,
    languageName,
    language: getLanguage(languageName),
    repoPath: process.cwd(),
    ...overrides,
  };
}

/**
 * Output stream that records everything written to it
 */
export class CapturedStream {
  chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get text(): string {
    return this.chunks.join('');
  }

  get lines(): string[] {
    return this.text.split('\n');
  }
}
