/**
 * Error types and error codes for the hostwatch backend
 * Codes are grouped by the layer that raises them
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Probe errors (2000-2999)
  PROBE_UNAVAILABLE = 2000,
  PROBE_TIMEOUT = 2001,
  PROBE_MALFORMED = 2002,

  // Resolution errors (3000-3999)
  INVARIANT_VIOLATION = 3000,

  // Serving errors (4000-4999)
  BAD_REQUEST = 4000,
  UNAUTHORIZED = 4001,
  NOT_FOUND = 4004,

  // Container runtime errors (5000-5999)
  CONTAINER_RUNTIME_ERROR = 5000,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  originalError?: Error;
  timestamp: number;
  stack?: string;
}
