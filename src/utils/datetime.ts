/**
 * Date/Time utilities using Luxon
 *
 * The scheduler pins one fixed UTC offset for every computation; there is no
 * DST handling.
 */

import { DateTime } from 'luxon';
import type { TimeWindow } from '../types/index.js';
import { getConfig } from './config.js';
import { invalidDateError } from './error.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/**
 * Luxon zone specifier for a "+05:30" style offset
 */
export function zoneFromOffset(utcOffset: string): string {
  return utcOffset === 'Z' ? 'UTC' : `UTC${utcOffset}`;
}

/**
 * Get the scheduling zone from configuration
 */
export function getSchedulingZone(): string {
  return zoneFromOffset(getConfig().defaults.utcOffset);
}

/**
 * Parse an ISO datetime string to Luxon DateTime
 *
 * Naive strings (no offset) are read in the given zone; strings with an
 * explicit offset are converted to it.
 */
export function parseDateTime(isoString: string, zone?: string): DateTime {
  const dt = DateTime.fromISO(isoString, { zone: zone ?? getSchedulingZone() });
  if (!dt.isValid) {
    throw invalidDateError(isoString, 'an ISO 8601 datetime');
  }
  return dt;
}

/**
 * Convert a Luxon DateTime to an ISO string with explicit offset
 */
export function toISOString(dt: DateTime): string {
  const iso = dt.toISO({ suppressMilliseconds: true });
  if (iso === null) {
    throw invalidDateError(String(dt.invalidReason), 'a valid datetime');
  }
  return iso;
}

/**
 * Format as YYYY-MM-DD
 */
export function toDateString(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}

/**
 * Get current time in the scheduling zone
 */
export function now(zone?: string): DateTime {
  return DateTime.now().setZone(zone ?? getSchedulingZone());
}

/**
 * Parse a strict YYYY-MM-DD date to the start of that day in the zone
 */
export function parseLocalDate(value: string, zone?: string): DateTime {
  const trimmed = value.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    throw invalidDateError(value, 'YYYY-MM-DD');
  }
  const dt = DateTime.fromISO(trimmed, { zone: zone ?? getSchedulingZone() });
  if (!dt.isValid) {
    throw invalidDateError(value, 'YYYY-MM-DD');
  }
  return dt.startOf('day');
}

/**
 * Parse an HH:MM clock time
 */
export function parseClockTime(value: string): { hour: number; minute: number } {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) {
    throw invalidDateError(value, 'HH:MM');
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Combine a date with an HH:MM clock time
 */
export function atClockTime(date: DateTime, clock: string): DateTime {
  const { hour, minute } = parseClockTime(clock);
  return date.set({ hour, minute, second: 0, millisecond: 0 });
}

/**
 * Format a clock time for display (e.g., "09:30 AM")
 */
export function formatClock(dt: DateTime): string {
  return dt.setLocale('en-US').toFormat('hh:mm a');
}

/**
 * Format a time range (e.g., "10:00 AM - 11:00 AM")
 */
export function formatTimeRange(start: DateTime | string, end: DateTime | string): string {
  const startDt = typeof start === 'string' ? parseDateTime(start) : start;
  const endDt = typeof end === 'string' ? parseDateTime(end) : end;
  return `${formatClock(startDt)} - ${formatClock(endDt)}`;
}

/**
 * Format a slot start for display (e.g., "Wednesday, 07 Jan | 10:00 AM")
 */
export function formatSlotDisplay(dt: DateTime): string {
  return dt.setLocale('en-US').toFormat('cccc, dd LLL | hh:mm a');
}

/**
 * Calculate duration in minutes between two datetimes
 */
export function durationMinutes(start: DateTime | string, end: DateTime | string): number {
  const startDt = typeof start === 'string' ? parseDateTime(start) : start;
  const endDt = typeof end === 'string' ? parseDateTime(end) : end;
  return endDt.diff(startDt, 'minutes').minutes;
}

/**
 * Check if two half-open time ranges overlap
 */
export function rangesOverlap(
  start1: DateTime | string,
  end1: DateTime | string,
  start2: DateTime | string,
  end2: DateTime | string
): boolean {
  const s1 = typeof start1 === 'string' ? parseDateTime(start1) : start1;
  const e1 = typeof end1 === 'string' ? parseDateTime(end1) : end1;
  const s2 = typeof start2 === 'string' ? parseDateTime(start2) : start2;
  const e2 = typeof end2 === 'string' ? parseDateTime(end2) : end2;

  return s1 < e2 && e1 > s2;
}

/**
 * Build a window of ISO strings from two DateTimes
 */
export function toWindow(start: DateTime, end: DateTime): TimeWindow {
  return { start: toISOString(start), end: toISOString(end) };
}

/**
 * Format a day heading (e.g., "Wednesday, January 7, 2026")
 */
export function formatDayHeading(dt: DateTime): string {
  return dt.setLocale('en-US').toFormat('cccc, LLLL d, yyyy');
}
