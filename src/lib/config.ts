/**
 * Configuration for hookrun
 *
 * Hooks are declared in `.hookrunrc` (JSON5) at the repository root and
 * validated against `schemas/hookrunrc.schema.json`:
 *
 * ```json5
 * {
 *   failFast: false,
 *   hooks: [
 *     { id: 'check-json', entry: 'node scripts/check-json.js', types: ['json'] },
 *     { id: 'no-env', name: 'forbid .env files', language: 'fail', entry: 'do not commit .env', files: '\\.env$' },
 *   ],
 * }
 * ```
 */

import fs from 'fs';
import path from 'path';
import JSON5 from 'json5';
import AjvModule, { type SchemaObject } from 'ajv';
import { CONFIG_FILE_NAMES } from './constants.js';
import { ConfigurationError } from './errors.js';
import { FilenameFilter } from './hooks/filters.js';
import { getLanguage, type LanguageName } from './languages/index.js';
import type { Hook } from './hooks/types.js';

const Ajv = AjvModule.default;

const SCHEMA_URL = new URL('../../schemas/hookrunrc.schema.json', import.meta.url);

/**
 * A hook as written in the config file
 */
export interface HookConfig {
  id: string;
  name?: string;
  alias?: string;
  entry: string;
  language?: LanguageName;
  args?: string[];
  files?: string;
  exclude?: string;
  types?: string[];
  typesOr?: string[];
  excludeTypes?: string[];
  alwaysRun?: boolean;
  failFast?: boolean;
  requireSerial?: boolean;
  passFilenames?: boolean;
  verbose?: boolean;
  logFile?: string;
}

/**
 * The config file
 */
export interface HookrunConfig {
  /** Global include pattern */
  files?: string;
  /** Global exclude pattern */
  exclude?: string;
  /** Stop after the first failing hook */
  failFast?: boolean;
  hooks: HookConfig[];
}

/**
 * Config with defaults applied and hooks resolved
 */
export interface ResolvedConfig {
  configPath: string;
  files: string;
  exclude: string;
  failFast: boolean;
  hooks: Hook[];
}

/**
 * Get default values for optional hook fields
 */
export function getDefaultHookConfig(): Required<Omit<HookConfig, 'id' | 'name' | 'entry' | 'logFile'>> {
  return {
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
  };
}

let validator: ((data: unknown) => data is HookrunConfig) | null = null;
let validatorErrors: () => string[] = () => [];

function getValidator(): (data: unknown) => data is HookrunConfig {
  if (validator) {
    return validator;
  }
  const schema: SchemaObject = JSON.parse(fs.readFileSync(SCHEMA_URL, 'utf8'));
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<HookrunConfig>(schema);
  validatorErrors = () =>
    (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'is invalid'}`);
  validator = (data: unknown): data is HookrunConfig => validate(data);
  return validator;
}

/**
 * Find the config file in the repository root
 */
export function findConfigFile(repoRoot: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = path.join(repoRoot, fileName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Parse and validate config file content
 */
export function parseConfig(content: string, configFile: string): HookrunConfig {
  let data: unknown;
  try {
    data = JSON5.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${configFile}: ${message}`, { configFile });
  }

  const validate = getValidator();
  if (!validate(data)) {
    const issues = validatorErrors();
    throw new ConfigurationError(`Invalid config ${configFile}:\n  ${issues.join('\n  ')}`, {
      configFile,
      issues,
    });
  }
  return data;
}

/**
 * Build the immutable hook descriptor from its config entry.
 * Patterns are compiled here so malformed ones fail before any hook runs.
 */
export function resolveHook(config: HookConfig, repoPath: string): Hook {
  const merged = { ...getDefaultHookConfig(), ...config };

  // Throws ConfigurationError for malformed patterns
  new FilenameFilter(merged.files, merged.exclude);

  return Object.freeze({
    id: merged.id,
    alias: merged.alias,
    name: merged.name ?? merged.id,
    entry: merged.entry,
    args: Object.freeze([...merged.args]),
    files: merged.files,
    exclude: merged.exclude,
    types: Object.freeze([...merged.types]),
    typesOr: Object.freeze([...merged.typesOr]),
    excludeTypes: Object.freeze([...merged.excludeTypes]),
    alwaysRun: merged.alwaysRun,
    failFast: merged.failFast,
    requireSerial: merged.requireSerial,
    passFilenames: merged.passFilenames,
    verbose: merged.verbose,
    logFile: merged.logFile,
    languageName: merged.language,
    language: getLanguage(merged.language),
    repoPath,
  });
}

/**
 * Load, validate and resolve the config for a repository
 */
export function loadConfig(repoRoot: string, configPath?: string): ResolvedConfig {
  const file = configPath ? path.resolve(repoRoot, configPath) : findConfigFile(repoRoot);
  if (!file || !fs.existsSync(file)) {
    throw new ConfigurationError(
      `No config file found (looked for ${configPath ?? CONFIG_FILE_NAMES.join(', ')} in ${repoRoot})`,
      { configFile: file ?? undefined }
    );
  }

  const config = parseConfig(fs.readFileSync(file, 'utf8'), file);
  const files = config.files ?? '';
  const exclude = config.exclude ?? '^$';

  try {
    new FilenameFilter(files, exclude);
    return {
      configPath: file,
      files,
      exclude,
      failFast: config.failFast ?? false,
      hooks: config.hooks.map((hook) => resolveHook(hook, repoRoot)),
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${error.message} (in ${file})`, {
        configFile: file,
        field: error.field,
      });
    }
    throw error;
  }
}
