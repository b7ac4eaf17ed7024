import { describe, it, expect, vi, afterEach } from 'vitest';
import { FilenameFilter, TagFilter, filterFilenames, type Classifier } from './filters.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';
import { makeHook } from '../../test-helpers/index.js';

describe('FilenameFilter', () => {
  it('matches everything without patterns', () => {
    const filter = new FilenameFilter();
    expect(filter.matches('a.txt')).toBe(true);
    expect(filter.matches('dir/b.json')).toBe(true);
  });

  it('uses unanchored search for include', () => {
    const filter = new FilenameFilter('\\.py');
    expect(filter.matches('src/main.py')).toBe(true);
    expect(filter.matches('src/main.pyc')).toBe(true);
    expect(filter.matches('README.md')).toBe(false);
  });

  it('drops paths matching exclude', () => {
    const filter = new FilenameFilter('\\.js$', '^vendor/');
    expect(filter.matches('src/app.js')).toBe(true);
    expect(filter.matches('vendor/lib.js')).toBe(false);
  });

  it('excludes nothing with the default exclude pattern', () => {
    const filter = new FilenameFilter('', '^$');
    expect(filter.matches('a.txt')).toBe(true);
  });

  it('is the conjunction of include and not exclude', () => {
    const includes = ['', '\\.txt$', '^src/', 'a'];
    const excludes = ['^$', 'b', '\\.txt$', '^src/'];
    const paths = ['a.txt', 'b.txt', 'src/a.json', 'src/b.txt', 'lib/c.md', 'ab'];

    for (const include of includes) {
      for (const exclude of excludes) {
        const filter = new FilenameFilter(include, exclude);
        for (const p of paths) {
          const expected = new RegExp(include).test(p) && !new RegExp(exclude).test(p);
          expect(filter.matches(p), `${include} / ${exclude} / ${p}`).toBe(expected);
        }
      }
    }
  });

  it('rejects malformed include patterns', () => {
    expect(() => new FilenameFilter('(')).toThrow(ConfigurationError);
    expect(() => new FilenameFilter('(')).toThrow(/^Invalid `files` pattern `\(`: /);
  });

  it('rejects malformed exclude patterns', () => {
    expect(() => new FilenameFilter('', '[')).toThrow(/^Invalid `exclude` pattern `\[`: /);
  });

  it('builds from a hook', () => {
    const filter = FilenameFilter.fromHook(makeHook({ files: '\\.md$', exclude: 'CHANGELOG' }));
    expect(filter.matches('README.md')).toBe(true);
    expect(filter.matches('CHANGELOG.md')).toBe(false);
  });
});

describe('TagFilter', () => {
  const tags = (...values: string[]): Set<string> => new Set(values);

  it('requires every tag in types', () => {
    const filter = new TagFilter(['file', 'json'], [], []);
    expect(filter.matches(tags('file', 'text', 'json'))).toBe(true);
    expect(filter.matches(tags('file', 'text'))).toBe(false);
  });

  it('requires at least one tag in typesOr when it is non-empty', () => {
    const filter = new TagFilter([], ['python', 'pyi'], []);
    expect(filter.matches(tags('file', 'pyi'))).toBe(true);
    expect(filter.matches(tags('file', 'javascript'))).toBe(false);
  });

  it('places no constraint with empty typesOr', () => {
    expect(new TagFilter([], [], []).matches(tags())).toBe(true);
  });

  it('rejects any tag in excludeTypes', () => {
    const filter = new TagFilter(['file'], [], ['binary', 'symlink']);
    expect(filter.matches(tags('file', 'text'))).toBe(true);
    expect(filter.matches(tags('file', 'binary'))).toBe(false);
  });

  it('is the conjunction of all three rules', () => {
    const filter = TagFilter.fromHook(
      makeHook({ types: ['text'], typesOr: ['json', 'yaml'], excludeTypes: ['executable'] })
    );
    expect(filter.matches(tags('text', 'json'))).toBe(true);
    expect(filter.matches(tags('text', 'yaml', 'executable'))).toBe(false);
    expect(filter.matches(tags('binary', 'json'))).toBe(false);
    expect(filter.matches(tags('text', 'markdown'))).toBe(false);
  });
});

describe('filterFilenames', () => {
  const table: Record<string, string[]> = {
    'a.txt': ['file', 'text'],
    'b.json': ['file', 'text', 'json'],
    'c.png': ['file', 'binary'],
    'docs/d.json': ['file', 'text', 'json'],
  };
  const classify: Classifier = (filename) => {
    const found = table[filename];
    if (!found) {
      throw new Error(`ENOENT: ${filename}`);
    }
    return new Set(found);
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps input order', () => {
    const hook = makeHook({ types: ['text'] });
    expect(filterFilenames(hook, ['docs/d.json', 'a.txt', 'b.json'], classify)).toEqual([
      'docs/d.json',
      'a.txt',
      'b.json',
    ]);
  });

  it('applies the filename filter and the tag filter', () => {
    const hook = makeHook({ types: ['json'], exclude: '^docs/' });
    expect(filterFilenames(hook, Object.keys(table), classify)).toEqual(['b.json']);
  });

  it('does not classify paths rejected by name', () => {
    const spy = vi.fn(classify);
    const hook = makeHook({ files: '\\.txt$' });
    filterFilenames(hook, ['a.txt', 'b.json'], spy);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('a.txt');
  });

  it('logs and drops paths that cannot be classified', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const hook = makeHook();
    expect(filterFilenames(hook, ['missing.txt', 'a.txt'], classify)).toEqual(['a.txt']);
    expect(error).toHaveBeenCalledWith(
      'Failed to get tags for `missing.txt`:',
      expect.any(Error)
    );
  });
});
