import { eastAsianWidth } from 'get-east-asian-width';

/**
 * ANSI color codes for terminal output
 */
export const codes = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  // Foreground colors
  black: '\x1b[30m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',

  // Background colors
  bgRed: '\x1b[41m',
  bgGreen: '\x1b[42m',
  bgYellow: '\x1b[43m',
  bgCyan: '\x1b[46m',
} as const;

/**
 * Check if colors should be enabled based on environment
 */
function shouldUseColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  // Respect FORCE_COLOR environment variable
  if (process.env.FORCE_COLOR !== undefined) {
    return true;
  }

  // Check if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

let colorEnabled = shouldUseColors();

/**
 * Enable or disable color output at runtime
 * Used by --no-color flag and NO_COLOR env var handling
 */
export function setColorEnabled(enabled: boolean): void {
  colorEnabled = enabled;
}

export function isColorEnabled(): boolean {
  return colorEnabled;
}

/**
 * Wrap text with ANSI color codes
 */
function colorize(text: string, code: string): string {
  if (!colorEnabled) {
    return text;
  }
  return `${code}${text}${codes.reset}`;
}

// Color functions
export function red(text: string): string {
  return colorize(text, codes.red);
}

export function yellow(text: string): string {
  return colorize(text, codes.yellow);
}

// Background color functions, used for status labels
export function onGreen(text: string): string {
  return colorize(text, codes.bgGreen);
}

export function onRed(text: string): string {
  return colorize(text, codes.bgRed);
}

export function blackOnYellow(text: string): string {
  return colorize(text, `${codes.black}${codes.bgYellow}`);
}

export function blackOnCyan(text: string): string {
  return colorize(text, `${codes.black}${codes.bgCyan}`);
}

// Style functions
export function dim(text: string): string {
  return colorize(text, codes.dim);
}

// Semantic output functions with icons
export function warning(text: string): string {
  const icon = colorEnabled ? '⚠' : '[WARN]';
  return `${yellow(icon)} ${yellow(text)}`;
}

export function error(text: string): string {
  const icon = colorEnabled ? '✗' : '[ERROR]';
  return `${red(icon)} ${red(text)}`;
}

/**
 * Number of terminal columns a string occupies. East Asian wide and
 * fullwidth characters (CJK, emoji) take two.
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += eastAsianWidth(char.codePointAt(0) ?? 0);
  }
  return width;
}
