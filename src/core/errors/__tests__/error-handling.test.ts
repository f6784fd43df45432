/**
 * Tests for error handling system
 */

import { describe, it, expect } from 'vitest';
import {
  CrosscheckError,
  AgentCallError,
  TimeoutError,
  ToolNotFoundError,
  EmptyResponseError,
  UnknownAgentError,
  OrchestrationError,
  SessionStateError,
  ValidationError,
  ErrorCode,
  isRetryableError,
  isAgentCallError,
  isCrosscheckError,
  getErrorMessage,
  getUserFriendlyMessage,
  wrapError,
} from '../index.js';

describe('Error Classes', () => {
  describe('CrosscheckError', () => {
    it('should create error with all properties', () => {
      const error = new CrosscheckError({
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Test error',
        context: { key: 'value' },
        isRetryable: true,
      });

      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('CrosscheckError');
      expect(error.context).toEqual({ key: 'value' });
      expect(error.isRetryable).toBe(true);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should serialize to JSON correctly', () => {
      const cause = new Error('root cause');
      const error = new CrosscheckError({
        code: ErrorCode.CONFIG_INVALID,
        message: 'Bad config',
        cause,
      });

      const json = error.toJSON();
      expect(json['code']).toBe('CFG_001');
      expect(json['message']).toBe('Bad config');
      expect(json['cause']).toBe('root cause');
      expect(json['timestamp']).toBe(error.timestamp.toISOString());
    });
  });

  describe('AgentCallError family', () => {
    it('should share one base class', () => {
      const errors = [
        new UnknownAgentError('llama', ['claude', 'openai', 'gemini']),
        new ToolNotFoundError('codex'),
        new TimeoutError('Reviewer (codex)', 5000),
        new EmptyResponseError('nothing'),
      ];

      for (const error of errors) {
        expect(error).toBeInstanceOf(AgentCallError);
        expect(isAgentCallError(error)).toBe(true);
      }
    });

    it('should format timeout messages in seconds', () => {
      const error = new TimeoutError('Critic (gemini)', 120_000, {
        role: 'critic',
      });

      expect(error.message).toBe(
        'Critic (gemini) timed out after 120s. Try increasing --timeout.'
      );
      expect(error.code).toBe(ErrorCode.AGENT_TIMEOUT);
      expect(error.context).toEqual({ role: 'critic', timeoutMs: 120_000 });
      expect(error.isRetryable).toBe(true);
    });

    it('should name the missing binary', () => {
      const error = new ToolNotFoundError('gemini', { tool: 'gemini' });

      expect(error.message).toBe(
        "CLI binary 'gemini' not found. Is it installed and in PATH?"
      );
      expect(error.context).toEqual({ tool: 'gemini', binary: 'gemini' });
      expect(error.isRetryable).toBe(false);
    });

    it('should list known agents for an unknown key', () => {
      const error = new UnknownAgentError('llama', ['claude', 'openai']);
      expect(error.message).toBe(
        "Unknown agent 'llama'. Expected one of: claude, openai"
      );
    });
  });

  describe('OrchestrationError', () => {
    it('should record where the run stopped', () => {
      const cause = new TimeoutError('Reviewer (codex)', 2000);
      const error = new OrchestrationError(
        { phase: 'review', cycle: 2, role: 'Reviewer', tool: 'openai' },
        cause
      );

      expect(error.message).toBe(
        'Reviewer (openai) failed at cycle 2 review: Reviewer (codex) timed out after 2s. Try increasing --timeout.'
      );
      expect(error.code).toBe(ErrorCode.LOOP_ABORTED);
      expect(error.phase).toBe('review');
      expect(error.cycle).toBe(2);
      expect(error.cause).toBe(cause);
      expect(error.context?.['causeCode']).toBe(ErrorCode.AGENT_TIMEOUT);
    });

    it('should describe the initial generation as phase 0', () => {
      const error = new OrchestrationError(
        { phase: 'create', cycle: 0, role: 'Creator', tool: 'claude' },
        new EmptyResponseError('Creator (claude) returned an empty response.')
      );

      expect(error.message).toBe(
        'Creator (claude) failed at phase 0 create: Creator (claude) returned an empty response.'
      );
    });

    it('should accept causes from outside the hierarchy', () => {
      const error = new OrchestrationError(
        { phase: 'review', cycle: 3, role: 'Reviewer', tool: 'openai' },
        new Error('EISDIR: illegal operation on a directory')
      );

      expect(error.causeCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.context?.['causeCode']).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.message).toBe(
        'Reviewer (openai) failed at cycle 3 review: EISDIR: illegal operation on a directory'
      );
    });
  });

  describe('Error Helpers', () => {
    it('should identify retryable errors', () => {
      expect(isRetryableError(new TimeoutError('x', 1000))).toBe(true);
      expect(isRetryableError(new ValidationError('Invalid input'))).toBe(
        false
      );
      expect(isRetryableError(new Error('plain'))).toBe(false);
    });

    it('should extract error messages safely', () => {
      expect(getErrorMessage(new Error('Test'))).toBe('Test');
      expect(getErrorMessage('String error')).toBe('String error');
      expect(getErrorMessage({ message: 'Object error' })).toBe('Object error');
      expect(getErrorMessage(null)).toBe('An unknown error occurred');
      expect(getErrorMessage(undefined)).toBe('An unknown error occurred');
    });

    it('should wrap errors correctly', () => {
      const originalError = new Error('Original');
      const wrapped = wrapError(
        originalError,
        'Wrapped message',
        ErrorCode.INTERNAL_ERROR,
        { extra: 'context' }
      );

      expect(wrapped).toBeInstanceOf(CrosscheckError);
      expect(wrapped.message).toBe('Original');
      expect(wrapped.cause).toBe(originalError);
      expect(wrapped.context).toEqual({ extra: 'context' });
    });

    it('should use the default message for non-errors', () => {
      const wrapped = wrapError(42, 'Something broke');
      expect(wrapped.message).toBe('Something broke');
      expect(wrapped.cause).toBeUndefined();
    });

    it('should not double-wrap CrosscheckErrors', () => {
      const sessionError = new SessionStateError(
        'sealed',
        ErrorCode.SESSION_SEALED
      );
      const wrapped = wrapError(sessionError, 'Default');

      expect(wrapped).toBe(sessionError);
      expect(isCrosscheckError(wrapped)).toBe(true);
    });

    it('should give a hint per error code', () => {
      expect(getUserFriendlyMessage(ErrorCode.AGENT_TOOL_NOT_FOUND)).toBe(
        'Install the missing CLI or run `crosscheck doctor` to see what is missing.'
      );
      expect(getUserFriendlyMessage(ErrorCode.SESSION_SEALED)).toBe(
        'An unexpected error occurred.'
      );
    });
  });
});
