/**
 * Logging system for hookrun
 *
 * Consola-based singleton logger with a ConditionalStderrReporter:
 * warnings and errors always reach stderr, info/debug/trace only when
 * verbose output was requested.
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (--quiet, --verbose, --no-color)
 * 2. Environment variable HOOKRUN_LOG_LEVEL
 * 3. Default (INFO)
 */

import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { ENV_LOG_LEVEL, LogLevel } from './constants.js';
import { setColorEnabled } from './colors.js';

export { LogLevel };

/**
 * Destination for reporter output. Tests swap this for a buffer.
 */
export interface LogSink {
  write(chunk: string): unknown;
}

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 * WARN and ERROR always print; DEBUG/INFO/TRACE only print when verbose=true.
 */
export class ConditionalStderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;
  private sink: LogSink;

  constructor(verbose: boolean, useColors: boolean, sink: LogSink = process.stderr) {
    this.verbose = verbose;
    this.useColors = useColors;
    this.sink = sink;
  }

  log(logObj: LogObject): void {
    // Level < 2 means warn (1) or error/fatal (0): always print
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);

    const prefix = this.useColors ? colorizeLevel(levelName, logObj.level) : `[${levelName}]`;

    this.sink.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function levelToName(level: number): string {
  if (level <= 0) {
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  const RED = '\x1b[31m';
  const YELLOW = '\x1b[33m';
  const CYAN = '\x1b[36m';
  const GRAY = '\x1b[90m';
  const RESET = '\x1b[0m';

  switch (true) {
    case level <= 0:
      return `${RED}[${name}]${RESET}`;
    case level === 1:
      return `${YELLOW}[${name}]${RESET}`;
    case level <= 3:
      return `${CYAN}[${name}]${RESET}`;
    default:
      return `${GRAY}[${name}]${RESET}`;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.message;
      return typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a);
    })
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters; call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: LogLevel.INFO,
  reporters: [],
});

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  sink?: LogSink;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  let level: number;
  const envLevel = process.env[ENV_LOG_LEVEL];

  if (options.quiet) {
    level = LogLevel.ERROR;
  } else if (options.verbose) {
    level = LogLevel.DEBUG;
  } else if (envLevel) {
    level = parseLogLevel(envLevel) ?? LogLevel.INFO;
  } else {
    level = LogLevel.INFO;
  }

  logger.level = level;

  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  // An explicit HOOKRUN_LOG_LEVEL above info implies the user wants to see it
  const verbose = options.verbose ?? level > LogLevel.INFO;
  logger.setReporters([new ConditionalStderrReporter(verbose, useColors, options.sink)]);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
    verbose: LogLevel.DEBUG,
  };
  return mapping[normalized];
}

/**
 * Reset module-level state for test isolation.
 */
export function _resetForTesting(): void {
  logger.setReporters([]);
  logger.level = LogLevel.INFO;
}
