/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error class for the cache hierarchy simulator.
 * Provides a coded error structure with serialization and cause chaining.
 */

import { ErrorCode, ExitCode, GeneralErrorCodes, getExitCodeForCode } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Cache level involved, if any */
  level?: string;
  /** Operation being performed */
  operation?: string;
  /** Address being accessed */
  address?: number;
}

/**
 * Serialized error format for reports and JSON output
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  exitCode: number;
  timestamp: string;
  level?: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all simulator errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Process exit code when this error ends a CLI run */
  public readonly exitCode: ExitCode;
  public readonly timestamp: Date;
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (bad configuration, malformed trace lines).
   * Non-operational errors are bugs in the simulator itself.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = getExitCodeForCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      timestamp: this.timestamp.toISOString(),
      level: this.context.level,
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error is operational (expected error)
 */
export function isOperationalError(error: unknown): boolean {
  if (isBaseError(error)) {
    return error.isOperational;
  }
  return false;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  if (isBaseError(error)) {
    return error.code === code;
  }
  return false;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

/**
 * Wrap an unknown error into a BaseError
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = GeneralErrorCodes.INTERNAL_ERROR
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, { details: { originalValue: error } });
}

/**
 * Internal error for wrapping unknown errors
 */
class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context, false);
    this.name = 'WrappedError';
  }
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
