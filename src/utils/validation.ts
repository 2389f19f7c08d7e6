/**
 * Input validation utilities
 */

import type { DateTime } from 'luxon';
import { parseClockTime, parseDateTime, parseLocalDate } from './datetime.js';
import { ErrorCodes, SchedulerError, validationError } from './error.js';

/**
 * Validate that a value is a non-empty string
 */
export function validateNonEmptyString(
  value: unknown,
  fieldName: string
): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw validationError(`${fieldName} must be a non-empty string`);
  }
}

/**
 * Validate an ISO 8601 datetime, returning it in the scheduling zone
 */
export function validateISODateTime(value: unknown, fieldName: string): DateTime {
  validateNonEmptyString(value, fieldName);
  try {
    return parseDateTime(value);
  } catch (error) {
    throw validationError(`${fieldName} must be a valid ISO 8601 datetime. Got: "${value}"`, {
      field: fieldName,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Validate a half-open time range (start must be before end)
 */
export function validateTimeRange(
  startTime: string,
  endTime: string
): { start: DateTime; end: DateTime } {
  const start = validateISODateTime(startTime, 'start');
  const end = validateISODateTime(endTime, 'end');

  if (start >= end) {
    throw new SchedulerError(
      'Start time must be before end time',
      ErrorCodes.INVALID_DATE_RANGE,
      { details: { start: startTime, end: endTime } }
    );
  }

  return { start, end };
}

/**
 * Validate a strict YYYY-MM-DD date string
 */
export function validateDateString(value: string): DateTime {
  return parseLocalDate(value);
}

/**
 * Validate an inclusive date range (start on or before end)
 */
export function validateDateRange(
  startDate: string,
  endDate: string
): { start: DateTime; end: DateTime } {
  const start = validateDateString(startDate);
  const end = validateDateString(endDate);

  if (start > end) {
    throw new SchedulerError(
      'Start date must not be after end date',
      ErrorCodes.INVALID_DATE_RANGE,
      { details: { startDate, endDate } }
    );
  }

  return { start, end };
}

/**
 * Validate an HH:MM clock time
 */
export function validateClockTime(value: string): string {
  const { hour, minute } = parseClockTime(value);
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * Validate positive integer
 */
export function validatePositiveInteger(
  value: unknown,
  fieldName: string
): asserts value is number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw validationError(`${fieldName} must be a positive integer. Got: ${String(value)}`);
  }
}

/**
 * Reject documents over the byte cap
 */
export function validateDocumentSize(byteLength: number, maxBytes: number): void {
  if (byteLength > maxBytes) {
    const sizeMb = (byteLength / (1024 * 1024)).toFixed(1);
    const maxMb = (maxBytes / (1024 * 1024)).toFixed(0);
    throw new SchedulerError(
      `Document is ${sizeMb} MB; the limit is ${maxMb} MB.`,
      ErrorCodes.DOCUMENT_TOO_LARGE,
      { details: { byteLength, maxBytes } }
    );
  }
}
