/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the agent. Tool-layer errors carry a
 * `toolErrorKind` so the registry can turn any failure into a structured
 * tool result the model can reason about. Provider errors are the only
 * ones that escape the loop.
 *
 * @example
 * ```typescript
 * throw FileOperationError.notFound('src/config.json', 'read');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors for recovery decisions.
 */
export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry (auth, missing file) */
  PERMANENT = 'PERMANENT',

  /** Validation errors - invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited - API rate limits hit, retry after delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Protocol errors - a peer answered with something we cannot parse */
  PROTOCOL = 'PROTOCOL',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

/**
 * Failure kinds reported back to the model inside a tool result.
 */
export type ToolErrorKind =
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'sandbox_violation'
  | 'operation_failed'
  | 'ambiguous_edit'
  | 'invalid_pattern'
  | 'timeout'
  | 'rejected';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all agent errors.
 */
export class AgentError extends Error {
  /** Error category for recovery decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** How the failure is labelled when it ends up in a tool result */
  readonly toolErrorKind: ToolErrorKind = 'operation_failed';

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AgentError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// TOOL-LAYER ERRORS
// =============================================================================

/**
 * A path resolved outside the workspace root.
 */
export class SandboxViolationError extends AgentError {
  override readonly toolErrorKind: ToolErrorKind = 'sandbox_violation';

  /** The path as the caller supplied it */
  readonly requestedPath: string;

  /** Canonical form of the path after resolution */
  readonly resolvedPath: string;

  /** Canonical workspace root */
  readonly root: string;

  constructor(requestedPath: string, resolvedPath: string, root: string) {
    super(
      `Access denied: '${requestedPath}' resolves to ${resolvedPath}, which is outside the workspace ${root}`,
      ErrorCategory.VALIDATION,
      true,
      { requestedPath, resolvedPath, root }
    );
    this.name = 'SandboxViolationError';
    this.requestedPath = requestedPath;
    this.resolvedPath = resolvedPath;
    this.root = root;
  }
}

/**
 * Error from validation failures (tool arguments, config files).
 */
export class ValidationError extends AgentError {
  override readonly toolErrorKind: ToolErrorKind = 'invalid_arguments';

  /** Field(s) that failed validation */
  readonly fields: string[];

  constructor(message: string, fields: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, true, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: {
    issues: Array<{ path: (string | number)[]; message: string }>;
  }): ValidationError {
    const fields = error.issues.map(i => i.path.join('.') || '(root)');
    const messages = error.issues.map(
      i => `${i.path.join('.') || '(root)'}: ${i.message}`
    );
    return new ValidationError(messages.join(', '), fields);
  }
}

/**
 * Error from file operations.
 */
export class FileOperationError extends AgentError {
  /** Path of the file operation (workspace-relative) */
  readonly path: string;

  /** Type of operation (read, write, edit, etc.) */
  readonly operation: string;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    path: string,
    operation: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, path, operation }, cause);
    this.name = 'FileOperationError';
    this.path = path;
    this.operation = operation;
  }

  static notFound(path: string, operation: string): FileOperationError {
    return new FileOperationError(
      `File not found: ${path}`,
      ErrorCategory.PERMANENT,
      true,
      path,
      operation
    );
  }

  static notAFile(path: string, operation: string): FileOperationError {
    return new FileOperationError(
      `Not a file: ${path}`,
      ErrorCategory.PERMANENT,
      true,
      path,
      operation
    );
  }

  static notADirectory(path: string, operation: string): FileOperationError {
    return new FileOperationError(
      `Not a directory: ${path}`,
      ErrorCategory.PERMANENT,
      true,
      path,
      operation
    );
  }

  static tooLarge(path: string, size: number, maxBytes: number): FileOperationError {
    return new FileOperationError(
      `File too large (${size} bytes). Max allowed: ${maxBytes}. Use offset/limit to read a portion.`,
      ErrorCategory.PERMANENT,
      true,
      path,
      'read',
      { size, maxBytes }
    );
  }

  static permissionDenied(path: string, operation: string): FileOperationError {
    return new FileOperationError(
      `Permission denied: ${path}`,
      ErrorCategory.PERMANENT,
      true,
      path,
      operation
    );
  }

  /**
   * Map a Node filesystem error onto the closest factory.
   */
  static fromSystemError(error: unknown, path: string, operation: string): FileOperationError {
    if (error instanceof FileOperationError) {
      return error;
    }
    const code = errorCode(error);
    if (code === 'ENOENT') return FileOperationError.notFound(path, operation);
    if (code === 'EACCES' || code === 'EPERM') {
      return FileOperationError.permissionDenied(path, operation);
    }
    if (code === 'EISDIR') return FileOperationError.notAFile(path, operation);
    if (code === 'ENOTDIR') return FileOperationError.notADirectory(path, operation);

    const err = error instanceof Error ? error : new Error(String(error));
    return new FileOperationError(
      `Failed to ${operation} ${path}: ${err.message}`,
      code === 'EBUSY' || code === 'EAGAIN' ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      true,
      path,
      operation,
      { code },
      err
    );
  }
}

/**
 * Exact-text edit matched more than once.
 */
export class AmbiguousEditError extends AgentError {
  override readonly toolErrorKind: ToolErrorKind = 'ambiguous_edit';

  readonly path: string;
  readonly occurrences: number;

  constructor(path: string, occurrences: number) {
    super(
      `Text appears ${occurrences} times in ${path}. Include more surrounding context so it matches exactly once.`,
      ErrorCategory.VALIDATION,
      true,
      { path, occurrences }
    );
    this.name = 'AmbiguousEditError';
    this.path = path;
    this.occurrences = occurrences;
  }
}

/**
 * The model supplied a regular expression that does not compile.
 */
export class InvalidPatternError extends AgentError {
  override readonly toolErrorKind: ToolErrorKind = 'invalid_pattern';

  readonly pattern: string;

  constructor(pattern: string, cause?: Error) {
    super(
      `Invalid regular expression '${pattern}': ${cause?.message ?? 'could not compile'}`,
      ErrorCategory.VALIDATION,
      true,
      { pattern },
      cause
    );
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }

  /**
   * Compile a pattern, converting syntax errors into InvalidPatternError.
   */
  static compile(pattern: string, flags?: string): RegExp {
    try {
      return new RegExp(pattern, flags);
    } catch (err) {
      throw new InvalidPatternError(pattern, err instanceof Error ? err : undefined);
    }
  }
}

/**
 * A shell command ran past its deadline and was killed.
 */
export class CommandTimeoutError extends AgentError {
  override readonly toolErrorKind: ToolErrorKind = 'timeout';

  readonly timeoutSec: number;

  /** Output captured before the process was killed */
  readonly stdout: string;
  readonly stderr: string;

  constructor(timeoutSec: number, output: { stdout: string; stderr: string }) {
    super(`Command timed out after ${timeoutSec}s`, ErrorCategory.TRANSIENT, true, { timeoutSec });
    this.name = 'CommandTimeoutError';
    this.timeoutSec = timeoutSec;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

/**
 * Generic error from tool execution.
 */
export class ToolError extends AgentError {
  /** Name of the tool that failed */
  readonly toolName: string;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    toolName: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, tool: toolName }, cause);
    this.name = 'ToolError';
    this.toolName = toolName;
  }

  /**
   * Create a ToolError from a generic error.
   */
  static fromError(error: Error, toolName: string): ToolError {
    const { category, recoverable } = categorizeError(error);
    return new ToolError(error.message, category, recoverable, toolName, undefined, error);
  }
}

// =============================================================================
// PROVIDER / SESSION ERRORS
// =============================================================================

export type ProviderErrorCode =
  | 'NETWORK_ERROR'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_REQUEST'
  | 'INVALID_RESPONSE'
  | 'CONTEXT_LENGTH_EXCEEDED'
  | 'UNKNOWN';

/**
 * Error from LLM provider calls. Fatal to the current loop run.
 */
export class ProviderError extends AgentError {
  /** Name of the provider */
  readonly providerName: string;

  readonly code: ProviderErrorCode;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    providerName: string,
    code: ProviderErrorCode,
    options: { statusCode?: number; cause?: Error } = {}
  ) {
    const category = providerCategory(code);
    super(
      message,
      category,
      category === ErrorCategory.TRANSIENT || category === ErrorCategory.RATE_LIMITED,
      { provider: providerName, code, statusCode: options.statusCode },
      options.cause
    );
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.code = code;
    this.statusCode = options.statusCode;
  }

  static rateLimited(providerName: string): ProviderError {
    return new ProviderError(`Rate limited by ${providerName}`, providerName, 'RATE_LIMITED', {
      statusCode: 429,
    });
  }

  static authenticationFailed(providerName: string, statusCode: number): ProviderError {
    return new ProviderError(
      `Authentication failed for ${providerName}`,
      providerName,
      'AUTHENTICATION_FAILED',
      { statusCode }
    );
  }

  static serverError(providerName: string, statusCode: number): ProviderError {
    return new ProviderError(
      `Server error from ${providerName}: ${statusCode}`,
      providerName,
      'SERVER_ERROR',
      { statusCode }
    );
  }

  static invalidResponse(providerName: string, detail: string): ProviderError {
    return new ProviderError(
      `Invalid response from ${providerName}: ${detail}`,
      providerName,
      'INVALID_RESPONSE'
    );
  }
}

function providerCategory(code: ProviderErrorCode): ErrorCategory {
  switch (code) {
    case 'NETWORK_ERROR':
    case 'SERVER_ERROR':
      return ErrorCategory.TRANSIENT;
    case 'RATE_LIMITED':
      return ErrorCategory.RATE_LIMITED;
    case 'INVALID_RESPONSE':
      return ErrorCategory.PROTOCOL;
    case 'AUTHENTICATION_FAILED':
    case 'INVALID_REQUEST':
    case 'CONTEXT_LENGTH_EXCEEDED':
      return ErrorCategory.PERMANENT;
    default:
      return ErrorCategory.INTERNAL;
  }
}

/**
 * Error when operation is cancelled.
 */
export class CancellationError extends AgentError {
  /** Reason for cancellation */
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

/**
 * Invalid configuration (unknown provider profile, bad CLI value).
 */
export class ConfigError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, context);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Read the `code` of a Node system error, if there is one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Determine error category from a generic error.
 */
export function categorizeError(error: Error): {
  category: ErrorCategory;
  recoverable: boolean;
} {
  const message = error.message.toLowerCase();
  const code = errorCode(error);

  if (
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET' ||
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    message.includes('timeout') ||
    message.includes('socket hang up') ||
    message.includes('fetch failed') ||
    message.includes('temporarily unavailable')
  ) {
    return { category: ErrorCategory.TRANSIENT, recoverable: true };
  }

  if (message.includes('rate limit') || message.includes('too many requests')) {
    return { category: ErrorCategory.RATE_LIMITED, recoverable: true };
  }

  if (message.includes('cancelled') || message.includes('aborted') || error.name === 'AbortError') {
    return { category: ErrorCategory.CANCELLED, recoverable: false };
  }

  return { category: ErrorCategory.INTERNAL, recoverable: false };
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof AgentError) {
    return error.category === ErrorCategory.CANCELLED;
  }
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Failure shape of a tool result: a message plus a machine-readable kind.
 */
export interface ToolFailure {
  error: string;
  kind: ToolErrorKind;
  [key: string]: unknown;
}

/**
 * Convert any thrown value into the failure shape of a tool result.
 */
export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof ValidationError) {
    return { error: `Invalid arguments: ${error.message}`, kind: error.toolErrorKind };
  }
  if (error instanceof CommandTimeoutError) {
    return {
      error: error.message,
      kind: error.toolErrorKind,
      exit_code: -1,
      stdout: error.stdout,
      stderr: error.stderr,
    };
  }
  if (error instanceof AgentError) {
    return { error: error.message, kind: error.toolErrorKind };
  }
  if (error instanceof Error) {
    return { error: error.message, kind: 'operation_failed' };
  }
  return { error: String(error), kind: 'operation_failed' };
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof AgentError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
