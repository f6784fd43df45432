/**
 * Custom error classes for crosscheck
 * Provides a hierarchy of error types so the loop controller can react
 * uniformly to any failed agent call
 */

export enum ErrorCode {
  // Agent call errors (AGENT_*)
  AGENT_UNKNOWN = 'AGENT_001',
  AGENT_TOOL_NOT_FOUND = 'AGENT_002',
  AGENT_TIMEOUT = 'AGENT_003',
  AGENT_EMPTY_RESPONSE = 'AGENT_004',
  AGENT_TOKEN_LIMIT = 'AGENT_005',
  AGENT_INVALID_REQUEST = 'AGENT_006',
  AGENT_SPAWN_FAILED = 'AGENT_007',

  // Session errors (SESSION_*)
  SESSION_WRITE_ONCE = 'SESSION_001',
  SESSION_OUT_OF_ORDER = 'SESSION_002',
  SESSION_CYCLE_OVERFLOW = 'SESSION_003',
  SESSION_SEALED = 'SESSION_004',
  SESSION_NOT_STARTED = 'SESSION_005',

  // Orchestration errors (LOOP_*)
  LOOP_ABORTED = 'LOOP_001',

  // Validation errors (VAL_*)
  VALIDATION_FAILED = 'VAL_001',
  INVALID_INPUT = 'VAL_002',

  // Configuration errors (CFG_*)
  CONFIG_INVALID = 'CFG_001',
  CONFIG_UNREADABLE = 'CFG_002',

  // System errors (SYS_*)
  INTERNAL_ERROR = 'SYS_001',
  FILE_NOT_FOUND = 'SYS_002',
  PERMISSION_DENIED = 'SYS_003',
  UNKNOWN_ERROR = 'SYS_004',
  WRITE_FAILED = 'SYS_005',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface CrosscheckErrorOptions {
  code: ErrorCode;
  message: string;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
}

/**
 * Base error class for all crosscheck errors
 */
export class CrosscheckError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(options: CrosscheckErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? false;
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Where an agent call happened. Every field is optional because the invoker
 * itself only knows the tool; the controller fills in the rest.
 */
export interface AgentCallContext extends ErrorContext {
  tool?: string;
  role?: string;
  binary?: string;
  exitCode?: number;
  timeoutMs?: number;
}

/**
 * Common family for every failed agent call
 */
export class AgentCallError extends CrosscheckError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: AgentCallContext,
    cause?: Error,
    isRetryable = false
  ) {
    super({ code, message, context, cause, isRetryable });
  }
}

export class UnknownAgentError extends AgentCallError {
  constructor(tool: string, known: readonly string[]) {
    super(
      `Unknown agent '${tool}'. Expected one of: ${known.join(', ')}`,
      ErrorCode.AGENT_UNKNOWN,
      { tool }
    );
  }
}

export class ToolNotFoundError extends AgentCallError {
  constructor(binary: string, context?: AgentCallContext, cause?: Error) {
    super(
      `CLI binary '${binary}' not found. Is it installed and in PATH?`,
      ErrorCode.AGENT_TOOL_NOT_FOUND,
      { ...context, binary },
      cause
    );
  }
}

export class TimeoutError extends AgentCallError {
  constructor(label: string, timeoutMs: number, context?: AgentCallContext) {
    super(
      `${label} timed out after ${Math.round(timeoutMs / 1000)}s. Try increasing --timeout.`,
      ErrorCode.AGENT_TIMEOUT,
      { ...context, timeoutMs },
      undefined,
      true
    );
  }
}

export class EmptyResponseError extends AgentCallError {
  constructor(message: string, context?: AgentCallContext) {
    super(message, ErrorCode.AGENT_EMPTY_RESPONSE, context);
  }
}

export class TokenLimitError extends AgentCallError {
  constructor(message: string, context?: AgentCallContext) {
    super(message, ErrorCode.AGENT_TOKEN_LIMIT, context);
  }
}

export class InvalidAgentRequestError extends AgentCallError {
  constructor(message: string, context?: AgentCallContext) {
    super(message, ErrorCode.AGENT_INVALID_REQUEST, context);
  }
}

export class AgentSpawnError extends AgentCallError {
  constructor(message: string, context?: AgentCallContext, cause?: Error) {
    super(message, ErrorCode.AGENT_SPAWN_FAILED, context, cause);
  }
}

/**
 * Session invariant violations (write-once fields, ordering, sealing)
 */
export class SessionStateError extends CrosscheckError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext) {
    super({ code, message, context });
  }
}

/**
 * Raised by the loop controller when a run stops at a phase
 */
export class OrchestrationError extends CrosscheckError {
  readonly phase: string;
  readonly cycle: number;
  readonly role: string;
  readonly tool: string;
  /** Code of the underlying failure; INTERNAL_ERROR for foreign errors */
  readonly causeCode: ErrorCode;

  constructor(
    location: { phase: string; cycle: number; role: string; tool: string },
    cause: Error
  ) {
    const where =
      location.cycle === 0 ? 'phase 0' : `cycle ${location.cycle}`;
    const causeCode =
      cause instanceof CrosscheckError ? cause.code : ErrorCode.INTERNAL_ERROR;
    super({
      code: ErrorCode.LOOP_ABORTED,
      message: `${location.role} (${location.tool}) failed at ${where} ${location.phase}: ${cause.message}`,
      context: { ...location, causeCode },
      cause,
    });
    this.phase = location.phase;
    this.cycle = location.cycle;
    this.role = location.role;
    this.tool = location.tool;
    this.causeCode = causeCode;
  }
}

export class ValidationError extends CrosscheckError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: ErrorContext
  ) {
    super({ code, message, context });
  }
}

export class ConfigError extends CrosscheckError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause });
  }
}

export class SystemError extends CrosscheckError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({ code, message, context, cause });
  }
}

/**
 * Helper function to safely extract error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}

/**
 * Helper function to wrap unknown errors in CrosscheckError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  context?: ErrorContext
): CrosscheckError {
  if (error instanceof CrosscheckError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : defaultMessage;

  return new SystemError(message, code, context, cause);
}

export function isCrosscheckError(error: unknown): error is CrosscheckError {
  return error instanceof CrosscheckError;
}

export function isAgentCallError(error: unknown): error is AgentCallError {
  return error instanceof AgentCallError;
}

/**
 * Helper function to determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof CrosscheckError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Short hint printed under the error message for each error code
 */
export function getUserFriendlyMessage(code: ErrorCode): string {
  switch (code) {
    case ErrorCode.AGENT_UNKNOWN:
      return 'Use one of the supported agents: claude, openai, gemini.';
    case ErrorCode.AGENT_TOOL_NOT_FOUND:
      return 'Install the missing CLI or run `crosscheck doctor` to see what is missing.';
    case ErrorCode.AGENT_TIMEOUT:
      return 'The agent took too long. Increase --timeout and try again.';
    case ErrorCode.AGENT_EMPTY_RESPONSE:
      return 'The agent returned nothing. Check that the CLI is authenticated.';
    case ErrorCode.AGENT_TOKEN_LIMIT:
      return 'The agent hit a token or rate limit. Try a smaller task or wait before retrying.';
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_UNREADABLE:
      return 'Configuration error. Check .crosscheck/config.json and CROSSCHECK_* variables.';
    case ErrorCode.VALIDATION_FAILED:
    case ErrorCode.INVALID_INPUT:
      return 'Invalid input provided. Check your command and try again.';
    case ErrorCode.FILE_NOT_FOUND:
      return 'The requested file or directory was not found.';
    case ErrorCode.PERMISSION_DENIED:
      return 'Permission denied. Check file permissions.';
    case ErrorCode.WRITE_FAILED:
      return 'A file could not be written. Check that the path is a writable file.';
    default:
      return 'An unexpected error occurred.';
  }
}
