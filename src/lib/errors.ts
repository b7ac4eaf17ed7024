/**
 * Custom error classes for hookrun
 *
 * Every error here is fatal to a run. Hooks that exit non-zero or modify
 * files are reported as results, never thrown.
 */

/**
 * Base error class for all hookrun errors
 */
export class HookRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookRunError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends HookRunError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, options: { command: string; exitCode?: number; stderr?: string }) {
    super(message);
    this.name = 'GitCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when configuration is invalid, including malformed patterns
 */
export class ConfigurationError extends HookRunError {
  public readonly configFile?: string;
  public readonly field?: string;
  public readonly issues?: string[];

  constructor(
    message: string,
    options: { configFile?: string; field?: string; issues?: string[] } = {}
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.configFile = options.configFile;
    this.field = options.field;
    this.issues = options.issues;
  }
}

/**
 * Error thrown when the working tree cannot be isolated for a run
 */
export class WorkTreeError extends HookRunError {
  constructor(message: string) {
    super(message);
    this.name = 'WorkTreeError';
  }
}

/**
 * Error thrown when a hook cannot be installed or its process cannot be started
 */
export class RunnerError extends HookRunError {
  public readonly hookId: string;

  constructor(message: string, options: { hookId: string }) {
    super(message);
    this.name = 'RunnerError';
    this.hookId = options.hookId;
  }
}

/**
 * Type guard to check if error is a HookRunError
 */
export function isHookRunError(error: unknown): error is HookRunError {
  return error instanceof HookRunError;
}

/**
 * Type guard to check if error is a GitCommandError
 */
export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}

/**
 * Type guard to check if error is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
