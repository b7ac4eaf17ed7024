/**
 * File classification
 *
 * Derives the tag set used by `types`, `typesOr` and `excludeTypes`
 * selection rules from a path: file kind, executable bit, text/binary and
 * language tags from the extension, well-known filenames or a shebang.
 */

import fs from 'fs';
import path from 'path';

interface FileTypeTable {
  extensions: Record<string, string[]>;
  names: Record<string, string[]>;
}

const TABLE_URL = new URL('../../../data/file-types.json', import.meta.url);

/** Interpreters recognised in `#!` lines */
const INTERPRETERS: Record<string, string[]> = {
  bash: ['shell', 'bash'],
  sh: ['shell', 'sh'],
  zsh: ['shell', 'zsh'],
  node: ['javascript'],
  python: ['python'],
  python3: ['python', 'python3'],
  ruby: ['ruby'],
};

let table: FileTypeTable | null = null;

function isTagRecord(value: unknown): value is Record<string, string[]> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every(
      (tags) => Array.isArray(tags) && tags.every((t) => typeof t === 'string')
    )
  );
}

function loadTable(): FileTypeTable {
  if (table) {
    return table;
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(TABLE_URL, 'utf8'));
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('extensions' in parsed) ||
    !('names' in parsed) ||
    !isTagRecord(parsed.extensions) ||
    !isTagRecord(parsed.names)
  ) {
    throw new Error(`Malformed file type table: ${TABLE_URL.pathname}`);
  }
  table = { extensions: parsed.extensions, names: parsed.names };
  return table;
}

/**
 * Tags implied by a filename alone (well-known name, then extension)
 */
export function tagsFromFilename(filename: string): Set<string> {
  const { extensions, names } = loadTable();
  const base = path.basename(filename);

  if (Object.hasOwn(names, base)) {
    return new Set(names[base]);
  }

  const ext = path.extname(base).slice(1).toLowerCase();
  if (ext && Object.hasOwn(extensions, ext)) {
    return new Set(extensions[ext]);
  }
  return new Set();
}

/**
 * Tags implied by a `#!` interpreter line
 */
export function tagsFromShebang(firstLine: string): string[] {
  if (!firstLine.startsWith('#!')) {
    return [];
  }
  const words = firstLine.slice(2).trim().split(/\s+/);
  // `#!/usr/bin/env python3` names the interpreter in the second word
  const program = path.basename(words[0] ?? '') === 'env' ? words[1] : words[0];
  if (!program) {
    return [];
  }
  return INTERPRETERS[path.basename(program)] ?? [];
}

function readHead(filePath: string): Buffer {
  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(1024);
    const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Classify a path. Throws when the path cannot be stat'ed or read.
 */
export function tagsFromPath(filePath: string, cwd?: string): Set<string> {
  const fullPath = cwd ? path.resolve(cwd, filePath) : filePath;
  const stats = fs.lstatSync(fullPath);

  if (stats.isDirectory()) return new Set(['directory']);
  if (stats.isSymbolicLink()) return new Set(['symlink']);
  if (stats.isSocket()) return new Set(['socket']);

  const tags = new Set(['file']);
  const executable = process.platform !== 'win32' && (stats.mode & 0o111) !== 0;
  tags.add(executable ? 'executable' : 'non-executable');

  for (const tag of tagsFromFilename(filePath)) {
    tags.add(tag);
  }

  if (!tags.has('text') && !tags.has('binary')) {
    const head = readHead(fullPath);
    const binary = head.includes(0);
    tags.add(binary ? 'binary' : 'text');
    if (!binary && executable) {
      const firstLine = head.toString('utf8').split('\n')[0] ?? '';
      for (const tag of tagsFromShebang(firstLine)) {
        tags.add(tag);
      }
    }
  }

  return tags;
}
