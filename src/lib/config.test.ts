import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';
import {
  getDefaultHookConfig,
  findConfigFile,
  parseConfig,
  resolveHook,
  loadConfig,
} from './config.js';
import { ConfigurationError } from './errors.js';
import { fail } from './languages/fail.js';
import { system } from './languages/system.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('config', () => {
  describe('getDefaultHookConfig', () => {
    it('should return default hook settings', () => {
      expect(getDefaultHookConfig()).toEqual({
        alias: '',
        language: 'system',
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
      });
    });
  });

  describe('parseConfig', () => {
    it('accepts JSON5 with comments and trailing commas', () => {
      const config = parseConfig(
        `{
          // hooks run in order
          failFast: true,
          hooks: [{ id: 'lint', entry: 'eslint', types: ['javascript'], },],
        }`,
        '.hookrunrc'
      );
      expect(config).toEqual({
        failFast: true,
        hooks: [{ id: 'lint', entry: 'eslint', types: ['javascript'] }],
      });
    });

    it('rejects malformed JSON5', () => {
      expect(() => parseConfig('{ hooks: [', '.hookrunrc')).toThrow(/^Failed to parse \.hookrunrc: /);
    });

    it('lists schema violations', () => {
      const error = captureError(() =>
        parseConfig('{ hooks: [{ id: "lint" }, { id: "x", entry: "y", language: "ruby" }] }', '.hookrunrc')
      );
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        configFile: '.hookrunrc',
        issues: [
          "/hooks/0: must have required property 'entry'",
          '/hooks/1/language: must be equal to one of the allowed values',
        ],
      });
    });

    it('rejects unknown keys', () => {
      const error = captureError(() => parseConfig('{ hooks: [], repos: [] }', '.hookrunrc'));
      expect(error).toMatchObject({ issues: ['/: must NOT have additional properties'] });
    });

    it('requires the hooks list', () => {
      const error = captureError(() => parseConfig('{}', '.hookrunrc'));
      expect(error).toMatchObject({ issues: ["/: must have required property 'hooks'"] });
    });
  });

  describe('resolveHook', () => {
    it('fills in defaults', () => {
      const hook = resolveHook({ id: 'lint', entry: 'eslint' }, '/repo');
      expect(hook).toMatchObject({
        id: 'lint',
        name: 'lint',
        alias: '',
        entry: 'eslint',
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
        logFile: undefined,
        languageName: 'system',
        repoPath: '/repo',
      });
      expect(hook.language).toBe(system);
    });

    it('keeps configured values', () => {
      const hook = resolveHook(
        {
          id: 'no-env',
          name: 'forbid .env',
          language: 'fail',
          entry: 'do not commit .env',
          files: '\\.env$',
          passFilenames: false,
        },
        '/repo'
      );
      expect(hook.name).toBe('forbid .env');
      expect(hook.files).toBe('\\.env$');
      expect(hook.passFilenames).toBe(false);
      expect(hook.language).toBe(fail);
    });

    it('returns a frozen descriptor', () => {
      const hook = resolveHook({ id: 'lint', entry: 'eslint', args: ['--fix'] }, '/repo');
      expect(Object.isFrozen(hook)).toBe(true);
      expect(Object.isFrozen(hook.args)).toBe(true);
    });

    it('rejects malformed patterns', () => {
      expect(() => resolveHook({ id: 'lint', entry: 'eslint', exclude: '(' }, '/repo')).toThrow(
        ConfigurationError
      );
    });
  });

  describe('loading from disk', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookrun-config-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('findConfigFile prefers .hookrunrc', () => {
      fs.writeFileSync(path.join(tempDir, '.hookrunrc.json'), '{"hooks": []}');
      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, '.hookrunrc.json'));

      fs.writeFileSync(path.join(tempDir, '.hookrunrc'), '{hooks: []}');
      expect(findConfigFile(tempDir)).toBe(path.join(tempDir, '.hookrunrc'));
    });

    it('findConfigFile returns null without a config', () => {
      expect(findConfigFile(tempDir)).toBeNull();
    });

    it('loadConfig resolves hooks against the repository root', () => {
      fs.writeFileSync(
        path.join(tempDir, '.hookrunrc'),
        `{ exclude: '^vendor/', hooks: [{ id: 'a', entry: 'true' }, { id: 'b', entry: 'false', failFast: true }] }`
      );
      const config = loadConfig(tempDir);
      expect(config.configPath).toBe(path.join(tempDir, '.hookrunrc'));
      expect(config.files).toBe('');
      expect(config.exclude).toBe('^vendor/');
      expect(config.failFast).toBe(false);
      expect(config.hooks.map((h) => h.id)).toEqual(['a', 'b']);
      expect(config.hooks[1].failFast).toBe(true);
      expect(config.hooks[0].repoPath).toBe(tempDir);
    });

    it('loadConfig accepts an explicit path', () => {
      fs.mkdirSync(path.join(tempDir, 'ci'));
      fs.writeFileSync(path.join(tempDir, 'ci', 'hooks.json5'), '{ hooks: [] }');
      const config = loadConfig(tempDir, 'ci/hooks.json5');
      expect(config.configPath).toBe(path.join(tempDir, 'ci', 'hooks.json5'));
      expect(config.hooks).toEqual([]);
    });

    it('loadConfig fails without a config file', () => {
      expect(() => loadConfig(tempDir)).toThrow(
        `No config file found (looked for .hookrunrc, .hookrunrc.json in ${tempDir})`
      );
    });

    it('loadConfig names the file for malformed global patterns', () => {
      fs.writeFileSync(path.join(tempDir, '.hookrunrc'), `{ files: '[', hooks: [] }`);
      const error = captureError(() => loadConfig(tempDir));
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ configFile: path.join(tempDir, '.hookrunrc'), field: 'files' });
    });
  });
});
