import { describe, it, expect, afterEach } from 'vitest';
import * as colors from './colors.js';

describe('colors', () => {
  const initial = colors.isColorEnabled();

  afterEach(() => {
    colors.setColorEnabled(initial);
  });

  describe('codes', () => {
    it('should export ANSI color codes', () => {
      expect(colors.codes.red).toBe('\x1b[31m');
      expect(colors.codes.yellow).toBe('\x1b[33m');
      expect(colors.codes.reset).toBe('\x1b[0m');
      expect(colors.codes.dim).toBe('\x1b[2m');
    });

    it('should export background color codes', () => {
      expect(colors.codes.bgRed).toBe('\x1b[41m');
      expect(colors.codes.bgGreen).toBe('\x1b[42m');
      expect(colors.codes.bgYellow).toBe('\x1b[43m');
      expect(colors.codes.bgCyan).toBe('\x1b[46m');
    });
  });

  describe('when colors are enabled', () => {
    it('wraps text in color codes', () => {
      colors.setColorEnabled(true);
      expect(colors.red('x')).toBe('\x1b[31mx\x1b[0m');
      expect(colors.dim('x')).toBe('\x1b[2mx\x1b[0m');
    });

    it('uses an icon for errors', () => {
      colors.setColorEnabled(true);
      expect(colors.error('boom')).toBe('\x1b[31m✗\x1b[0m \x1b[31mboom\x1b[0m');
    });
  });

  describe('when colors are disabled', () => {
    it('returns text unchanged', () => {
      colors.setColorEnabled(false);
      expect(colors.isColorEnabled()).toBe(false);
      expect(colors.onGreen('Passed')).toBe('Passed');
      expect(colors.onRed('Failed')).toBe('Failed');
      expect(colors.blackOnCyan('Skipped')).toBe('Skipped');
    });

    it('uses text labels for warnings and errors', () => {
      colors.setColorEnabled(false);
      expect(colors.warning('careful')).toBe('[WARN] careful');
      expect(colors.error('boom')).toBe('[ERROR] boom');
    });
  });

  describe('displayWidth', () => {
    it('counts ASCII characters as one column', () => {
      expect(colors.displayWidth('check json')).toBe(10);
    });

    it('counts CJK characters as two columns', () => {
      expect(colors.displayWidth('检查')).toBe(4);
      expect(colors.displayWidth('a检b')).toBe(4);
    });

    it('counts emoji as two columns', () => {
      expect(colors.displayWidth('🚀')).toBe(2);
      expect(colors.displayWidth('⚡ lint')).toBe(7);
    });

    it('counts fullwidth forms as two columns', () => {
      expect(colors.displayWidth('ＡＢ')).toBe(4);
    });

    it('returns 0 for an empty string', () => {
      expect(colors.displayWidth('')).toBe(0);
    });
  });
});
