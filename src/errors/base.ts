/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the cluster configuration resolver.
 * Provides a hierarchical error structure with proper serialization
 * and error cause chaining.
 */

import { ErrorCode, getHttpStatusForCode } from './codes.js';

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
  /** Template or config source (file path or '<inline>') */
  source?: string;
  /** Operation being performed */
  operation?: string;
}

/**
 * Serialized error format for API responses and CLI output
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  statusCode: number;
  timestamp: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all application errors.
 * Provides consistent error handling, serialization, and cause chaining.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** HTTP status code */
  public readonly statusCode: number;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (bad template, missing variable).
   * Non-operational errors are bugs that require attention.
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
    this.statusCode = getHttpStatusForCode(code);
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
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
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
  return isBaseError(error) && error.isOperational;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

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
 * Wrap an unknown thrown value into a BaseError
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = 'INTERNAL_ERROR'
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, {
    details: { originalValue: String(error) },
  });
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
