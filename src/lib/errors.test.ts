import { describe, it, expect } from 'vitest';
import {
  HookRunError,
  GitCommandError,
  ConfigurationError,
  WorkTreeError,
  RunnerError,
  isHookRunError,
  isGitCommandError,
  isConfigurationError,
} from './errors.js';

describe('errors', () => {
  describe('HookRunError', () => {
    it('should create error with message', () => {
      const error = new HookRunError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('HookRunError');
    });

    it('should be instanceof Error', () => {
      expect(new HookRunError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('GitCommandError', () => {
    it('should create error with command info', () => {
      const error = new GitCommandError('Git failed', {
        command: 'git write-tree',
        exitCode: 128,
        stderr: 'fatal: not a git repository',
      });
      expect(error.name).toBe('GitCommandError');
      expect(error.command).toBe('git write-tree');
      expect(error.exitCode).toBe(128);
      expect(error.stderr).toBe('fatal: not a git repository');
      expect(error).toBeInstanceOf(HookRunError);
    });
  });

  describe('ConfigurationError', () => {
    it('should carry the config file and issues', () => {
      const error = new ConfigurationError('Invalid config', {
        configFile: '/repo/.hookrunrc',
        issues: ['/hooks/0: must have required property \'entry\''],
      });
      expect(error.name).toBe('ConfigurationError');
      expect(error.configFile).toBe('/repo/.hookrunrc');
      expect(error.field).toBeUndefined();
      expect(error.issues).toEqual(['/hooks/0: must have required property \'entry\'']);
    });

    it('should work without options', () => {
      const error = new ConfigurationError('No config');
      expect(error.configFile).toBeUndefined();
      expect(error.issues).toBeUndefined();
    });
  });

  describe('WorkTreeError', () => {
    it('should have its own name', () => {
      const error = new WorkTreeError('busy');
      expect(error.name).toBe('WorkTreeError');
      expect(error).toBeInstanceOf(HookRunError);
    });
  });

  describe('RunnerError', () => {
    it('should carry the hook id', () => {
      const error = new RunnerError('Script not found', { hookId: 'lint' });
      expect(error.name).toBe('RunnerError');
      expect(error.hookId).toBe('lint');
    });
  });

  describe('type guards', () => {
    it('isHookRunError accepts every subclass', () => {
      expect(isHookRunError(new WorkTreeError('x'))).toBe(true);
      expect(isHookRunError(new RunnerError('x', { hookId: 'a' }))).toBe(true);
      expect(isHookRunError(new Error('x'))).toBe(false);
      expect(isHookRunError('x')).toBe(false);
    });

    it('isGitCommandError only accepts GitCommandError', () => {
      expect(isGitCommandError(new GitCommandError('x', { command: 'git' }))).toBe(true);
      expect(isGitCommandError(new ConfigurationError('x'))).toBe(false);
    });

    it('isConfigurationError only accepts ConfigurationError', () => {
      expect(isConfigurationError(new ConfigurationError('x'))).toBe(true);
      expect(isConfigurationError(new HookRunError('x'))).toBe(false);
    });
  });
});
