/**
 * Error handling utilities for the semester scheduler
 */

/**
 * Error codes used throughout the application
 */
export const ErrorCodes = {
  // Input validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_DATE_RANGE: 'INVALID_DATE_RANGE',
  INVALID_DATE: 'INVALID_DATE',
  DOCUMENT_TOO_LARGE: 'DOCUMENT_TOO_LARGE',

  // Store errors
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  NOT_FOUND: 'NOT_FOUND',

  // Cancellation rules
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  RETENTION_WINDOW_EXPIRED: 'RETENTION_WINDOW_EXPIRED',

  // Rate limiting
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',

  // Writes into a forbidden storage target
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',

  // Authentication errors
  AUTH_FAILED: 'AUTH_FAILED',
  AUTH_EXPIRED: 'AUTH_EXPIRED',
  AUTH_MISSING: 'AUTH_MISSING',

  // Oracle errors
  ORACLE_ERROR: 'ORACLE_ERROR',
  TIMEOUT: 'TIMEOUT',

  // Internal errors
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Custom error class for the scheduler
 */
export class SchedulerError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly retryAfter?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      retryable?: boolean;
      retryAfter?: number;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SchedulerError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.retryAfter = options?.retryAfter;
    this.details = options?.details;
  }
}

/**
 * Create a validation error (malformed window, bad input)
 */
export function validationError(
  message: string,
  details?: Record<string, unknown>
): SchedulerError {
  return new SchedulerError(message, ErrorCodes.VALIDATION_ERROR, { details });
}

/**
 * Create an invalid date error (bad YYYY-MM-DD or HH:MM string)
 */
export function invalidDateError(value: string, expected: string): SchedulerError {
  return new SchedulerError(
    `Invalid date/time "${value}". Expected ${expected}.`,
    ErrorCodes.INVALID_DATE,
    { details: { value, expected } }
  );
}

/**
 * Create a not found error
 */
export function notFoundError(reservationId: string): SchedulerError {
  return new SchedulerError(
    `Reservation not found: ${reservationId}`,
    ErrorCodes.NOT_FOUND,
    { details: { reservationId } }
  );
}

/**
 * Create a permission denied error naming the actual owner
 */
export function permissionDeniedError(
  action: string,
  owner: string
): SchedulerError {
  return new SchedulerError(
    `Permission denied: ${action}. This booking belongs to ${owner}.`,
    ErrorCodes.PERMISSION_DENIED,
    { details: { owner } }
  );
}

/**
 * Create a permission denied error for admin-only operations
 */
export function adminRequiredError(action: string): SchedulerError {
  return new SchedulerError(
    `Permission denied: ${action} requires an admin.`,
    ErrorCodes.PERMISSION_DENIED,
    { details: { action } }
  );
}

/**
 * Create a retention window expired error
 */
export function retentionWindowExpiredError(
  reservationId: string,
  windowHours: number
): SchedulerError {
  return new SchedulerError(
    `Cancellation denied. The ${windowHours}-hour free cancellation window has passed.`,
    ErrorCodes.RETENTION_WINDOW_EXPIRED,
    { details: { reservationId, windowHours } }
  );
}

/**
 * Create a quota exceeded error
 */
export function quotaExceededError(
  source: string,
  retryAfterSeconds?: number,
  cause?: Error
): SchedulerError {
  return new SchedulerError(
    `Rate limited by ${source}. Please try again later.`,
    ErrorCodes.QUOTA_EXCEEDED,
    { retryable: true, retryAfter: retryAfterSeconds ?? 60, cause }
  );
}

/**
 * Create an invariant violation error (write into a forbidden target)
 */
export function invariantViolationError(
  message: string,
  details?: Record<string, unknown>
): SchedulerError {
  return new SchedulerError(message, ErrorCodes.INVARIANT_VIOLATION, { details });
}

/**
 * Invariant violations signal a configuration bug and must stop the process
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof SchedulerError && error.code === ErrorCodes.INVARIANT_VIOLATION;
}

/**
 * Wrap an unknown error as SchedulerError
 */
export function wrapError(
  error: unknown,
  context?: {
    operation?: string;
    fallbackCode?: ErrorCode;
  }
): SchedulerError {
  if (error instanceof SchedulerError) {
    return error;
  }

  const message =
    error instanceof Error
      ? error.message
      : typeof error === 'string'
        ? error
        : 'An unexpected error occurred';

  return new SchedulerError(
    context?.operation ? `${context.operation}: ${message}` : message,
    context?.fallbackCode ?? ErrorCodes.INTERNAL_ERROR,
    {
      retryable: context?.fallbackCode === ErrorCodes.STORE_UNAVAILABLE,
      cause: error instanceof Error ? error : undefined,
    }
  );
}

/**
 * Format a SchedulerError for MCP response
 */
export function formatErrorForMCP(error: SchedulerError): string {
  const lines: string[] = [];

  lines.push(`Error: ${error.message}`);
  lines.push(`Code: ${error.code}`);

  if (error.retryable) {
    lines.push('This error is retryable.');
    if (error.retryAfter) {
      lines.push(`Retry after: ${error.retryAfter} seconds`);
    }
  }

  if (error.details) {
    lines.push(`Details: ${JSON.stringify(error.details)}`);
  }

  return lines.join('\n');
}
