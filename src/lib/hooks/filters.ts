/**
 * File selection for hooks
 *
 * A hook sees a file when its path passes the FilenameFilter built from
 * `files`/`exclude` and its tags pass the TagFilter built from `types`,
 * `typesOr` and `excludeTypes`.
 */

import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';
import { tagsFromPath } from './identify.js';
import type { Hook } from './types.js';

function compilePattern(pattern: string, field: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid \`${field}\` pattern \`${pattern}\`: ${message}`, {
      field,
    });
  }
}

/**
 * Include/exclude regex filter over paths. Patterns are unanchored.
 */
export class FilenameFilter {
  private readonly include: RegExp | null;
  private readonly exclude: RegExp | null;

  constructor(include?: string, exclude?: string) {
    this.include = include !== undefined ? compilePattern(include, 'files') : null;
    this.exclude = exclude !== undefined ? compilePattern(exclude, 'exclude') : null;
  }

  static fromHook(hook: Hook): FilenameFilter {
    return new FilenameFilter(hook.files, hook.exclude);
  }

  matches(filename: string): boolean {
    if (this.include && !this.include.test(filename)) {
      return false;
    }
    if (this.exclude && this.exclude.test(filename)) {
      return false;
    }
    return true;
  }
}

/**
 * Tag-set filter: every `all` tag, at least one `any` tag, no `exclude` tag
 */
export class TagFilter {
  constructor(
    private readonly all: readonly string[],
    private readonly any: readonly string[],
    private readonly exclude: readonly string[]
  ) {}

  static fromHook(hook: Hook): TagFilter {
    return new TagFilter(hook.types, hook.typesOr, hook.excludeTypes);
  }

  matches(tags: ReadonlySet<string>): boolean {
    if (this.all.length > 0 && !this.all.every((t) => tags.has(t))) {
      return false;
    }
    if (this.any.length > 0 && !this.any.some((t) => tags.has(t))) {
      return false;
    }
    return !this.exclude.some((t) => tags.has(t));
  }
}

/**
 * Classifier used by filterFilenames; injectable for tests
 */
export type Classifier = (filename: string) => ReadonlySet<string>;

/**
 * Select the files a hook applies to, preserving input order.
 *
 * Paths that cannot be classified are logged and left out; one unreadable
 * path never aborts the run.
 */
export function filterFilenames(
  hook: Hook,
  filenames: readonly string[],
  classify: Classifier
): string[] {
  const nameFilter = FilenameFilter.fromHook(hook);
  const tagFilter = TagFilter.fromHook(hook);

  return filenames.filter((filename) => {
    if (!nameFilter.matches(filename)) {
      return false;
    }
    let tags: ReadonlySet<string>;
    try {
      tags = classify(filename);
    } catch (error) {
      logger.error(`Failed to get tags for \`${filename}\`:`, error);
      return false;
    }
    return tagFilter.matches(tags);
  });
}

/**
 * Default classifier resolving paths against the repository root
 */
export function classifierFor(cwd?: string): Classifier {
  return (filename) => tagsFromPath(filename, cwd);
}
