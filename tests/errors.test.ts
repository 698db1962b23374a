/**
 * Tests for the centralized error types.
 */

import { describe, it, expect } from 'vitest';
import {
  AgentError,
  AmbiguousEditError,
  CancellationError,
  CommandTimeoutError,
  ConfigError,
  ErrorCategory,
  FileOperationError,
  InvalidPatternError,
  ProviderError,
  SandboxViolationError,
  ValidationError,
  categorizeError,
  formatError,
  formatErrorForLog,
  isCancellation,
  toToolFailure,
} from '../src/errors/index.js';

function systemError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

describe('Error Types', () => {
  describe('AgentError', () => {
    it('should create error with all properties', () => {
      const error = new AgentError('Something went wrong', ErrorCategory.TRANSIENT, true, { key: 'value' });

      expect(error.message).toBe('Something went wrong');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: 'value' });
      expect(error.toolErrorKind).toBe('operation_failed');
    });

    it('should format for logs with category and context', () => {
      const error = new AgentError('boom', ErrorCategory.INTERNAL, false, { step: 2 });
      expect(error.toLogString()).toBe('[AgentError] (INTERNAL) boom context={"step":2}');
    });
  });

  describe('FileOperationError.fromSystemError', () => {
    it('maps ENOENT to not found', () => {
      const error = FileOperationError.fromSystemError(systemError('ENOENT'), 'src/a.ts', 'read');
      expect(error.message).toBe('File not found: src/a.ts');
      expect(error.category).toBe(ErrorCategory.PERMANENT);
    });

    it('maps EACCES to permission denied', () => {
      const error = FileOperationError.fromSystemError(systemError('EACCES'), 'secret', 'write');
      expect(error.message).toBe('Permission denied: secret');
    });

    it('keeps an existing FileOperationError', () => {
      const original = FileOperationError.notADirectory('a', 'ls');
      expect(FileOperationError.fromSystemError(original, 'b', 'ls')).toBe(original);
    });

    it('treats EBUSY as transient', () => {
      const error = FileOperationError.fromSystemError(systemError('EBUSY', 'resource busy'), 'a', 'write');
      expect(error.category).toBe(ErrorCategory.TRANSIENT);
      expect(error.message).toBe('Failed to write a: resource busy');
    });
  });

  describe('ProviderError', () => {
    it('classifies codes', () => {
      expect(ProviderError.rateLimited('openai').category).toBe(ErrorCategory.RATE_LIMITED);
      expect(ProviderError.rateLimited('openai').recoverable).toBe(true);
      expect(ProviderError.authenticationFailed('openai', 401).category).toBe(ErrorCategory.PERMANENT);
      expect(ProviderError.authenticationFailed('openai', 401).recoverable).toBe(false);
      expect(ProviderError.serverError('openai', 502).category).toBe(ErrorCategory.TRANSIENT);
      expect(ProviderError.invalidResponse('openai', 'no choices').category).toBe(ErrorCategory.PROTOCOL);
    });

    it('keeps status code and provider name', () => {
      const error = ProviderError.serverError('mistral', 503);
      expect(error.statusCode).toBe(503);
      expect(error.providerName).toBe('mistral');
      expect(error.message).toBe('Server error from mistral: 503');
    });
  });

  describe('toToolFailure', () => {
    it('labels sandbox violations', () => {
      const failure = toToolFailure(new SandboxViolationError('../x', '/tmp/x', '/ws'));
      expect(failure).toEqual({
        error: "Access denied: '../x' resolves to /tmp/x, which is outside the workspace /ws",
        kind: 'sandbox_violation',
      });
    });

    it('prefixes validation errors', () => {
      const failure = toToolFailure(new ValidationError('path: Required', ['path']));
      expect(failure).toEqual({ error: 'Invalid arguments: path: Required', kind: 'invalid_arguments' });
    });

    it('includes captured output for timeouts', () => {
      const failure = toToolFailure(new CommandTimeoutError(5, { stdout: 'partial', stderr: '' }));
      expect(failure).toEqual({
        error: 'Command timed out after 5s',
        kind: 'timeout',
        exit_code: -1,
        stdout: 'partial',
        stderr: '',
      });
    });

    it('labels ambiguous edits', () => {
      expect(toToolFailure(new AmbiguousEditError('a.ts', 3)).kind).toBe('ambiguous_edit');
    });

    it('handles plain errors and non-errors', () => {
      expect(toToolFailure(new Error('disk on fire'))).toEqual({ error: 'disk on fire', kind: 'operation_failed' });
      expect(toToolFailure('weird')).toEqual({ error: 'weird', kind: 'operation_failed' });
    });
  });

  describe('InvalidPatternError.compile', () => {
    it('compiles valid patterns', () => {
      expect(InvalidPatternError.compile('a+b', 'g').flags).toBe('g');
    });

    it('throws InvalidPatternError for invalid patterns', () => {
      expect(() => InvalidPatternError.compile('(')).toThrow(InvalidPatternError);
      try {
        InvalidPatternError.compile('[');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidPatternError);
        expect(toToolFailure(error).kind).toBe('invalid_pattern');
      }
    });
  });

  describe('ValidationError.fromZodError', () => {
    it('joins issues with their paths', () => {
      const error = ValidationError.fromZodError({
        issues: [
          { path: ['path'], message: 'Required' },
          { path: [], message: 'Expected object' },
        ],
      });
      expect(error.message).toBe('path: Required, (root): Expected object');
      expect(error.fields).toEqual(['path', '(root)']);
    });
  });

  describe('utilities', () => {
    it('categorizes generic errors', () => {
      expect(categorizeError(new Error('socket hang up')).category).toBe(ErrorCategory.TRANSIENT);
      expect(categorizeError(new Error('Too Many Requests')).category).toBe(ErrorCategory.RATE_LIMITED);
      expect(categorizeError(new Error('something odd')).category).toBe(ErrorCategory.INTERNAL);
    });

    it('detects cancellation', () => {
      const abort = new Error('The operation was aborted');
      abort.name = 'AbortError';

      expect(isCancellation(new CancellationError())).toBe(true);
      expect(isCancellation(abort)).toBe(true);
      expect(isCancellation(new Error('nope'))).toBe(false);
      expect(isCancellation(ProviderError.rateLimited('x'))).toBe(false);
    });

    it('formats errors for display', () => {
      expect(formatError(new ConfigError('Unknown provider'))).toBe('ConfigError: Unknown provider');
      expect(formatError(new Error('plain'))).toBe('plain');
      expect(formatError(42)).toBe('42');
    });

    it('formats errors for logs', () => {
      expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
      expect(formatErrorForLog('text')).toBe('[Unknown] text');
    });
  });
});
