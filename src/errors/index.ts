import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the hostwatch backend
 * Extends native Error with additional metadata
 */
export class HostwatchError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'HostwatchError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends HostwatchError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * A resolver produced a record that breaks its own invariants.
 * Always a programming error, never an environment condition.
 */
export class InvariantViolationError extends HostwatchError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.INVARIANT_VIOLATION, ErrorSeverity.CRITICAL, context);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Container runtime command errors
 */
export class ContainerRuntimeError extends HostwatchError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONTAINER_RUNTIME_ERROR, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ContainerRuntimeError';
  }
}

/**
 * Errors raised by the serving layer, carrying their HTTP status
 */
export class HttpError extends HostwatchError {
  public readonly status: number;

  constructor(status: number, message: string, code: ErrorCode, context?: ErrorContext) {
    super(message, code, ErrorSeverity.LOW, context);
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * Validation errors
 */
export class ValidationError extends HostwatchError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
