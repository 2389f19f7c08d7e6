/**
 * Recurrence Expander
 * Maps weekday timetable rows onto concrete dates and encodes the weekly
 * repeat-until rule stored with recurring reservations
 */

import { DateTime } from 'luxon';
import type { DayOfWeek } from '../types/index.js';
import { parseLocalDate, toDateString } from '../utils/datetime.js';
import { validationError } from '../utils/error.js';

/**
 * Luxon weekday numbers (Monday = 1)
 */
export const WEEKDAY_NUMBERS: Record<DayOfWeek, number> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

const WEEKDAYS: readonly DayOfWeek[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

const UNTIL_FORMAT = "yyyyMMdd'T'HHmmss'Z'";

export interface WeeklyRule {
  frequency: 'WEEKLY';
  /** Last instant (UTC) an occurrence may start */
  until?: DateTime;
}

/**
 * Parse "Wednesday", "wed" or "WEDNESDAY" to a DayOfWeek
 */
export function parseWeekday(name: string): DayOfWeek {
  const key = name.trim().toLowerCase();
  const match = WEEKDAYS.find(day => day === key || (key.length >= 3 && day.startsWith(key)));
  if (!match) {
    throw validationError(`Unknown weekday "${name}"`, { weekday: name });
  }
  return match;
}

/**
 * Weekday of a date as a DayOfWeek
 */
export function weekdayOf(date: DateTime): DayOfWeek {
  const day = WEEKDAYS[date.weekday - 1];
  if (!day) {
    throw validationError(`Invalid date ${date.toISO() ?? ''}`);
  }
  return day;
}

/**
 * First date on or after the semester start that falls on the weekday
 */
export function firstOccurrence(semesterStart: string | DateTime, weekdayName: string): string {
  const start = typeof semesterStart === 'string' ? parseLocalDate(semesterStart) : semesterStart.startOf('day');
  const target = WEEKDAY_NUMBERS[parseWeekday(weekdayName)];
  const daysAhead = (target - start.weekday + 7) % 7;
  return toDateString(start.plus({ days: daysAhead }));
}

/**
 * Weekly repeat through the end of `untilDate` (inclusive)
 */
export function buildRecurrenceRule(untilDate: string | DateTime): string {
  const until = typeof untilDate === 'string' ? parseLocalDate(untilDate) : untilDate;
  return `RRULE:FREQ=WEEKLY;UNTIL=${until.toFormat('yyyyMMdd')}T235959Z`;
}

/**
 * Parse a weekly rule written by buildRecurrenceRule (or a bare FREQ=WEEKLY)
 */
export function parseRecurrenceRule(rule: string): WeeklyRule | undefined {
  const body = rule.startsWith('RRULE:') ? rule.slice('RRULE:'.length) : rule;
  const params: Record<string, string> = {};

  for (const part of body.split(';')) {
    const [key, value] = part.split('=');
    if (key && value) {
      params[key.toUpperCase()] = value;
    }
  }

  if (params['FREQ'] !== 'WEEKLY') return undefined;

  const untilRaw = params['UNTIL'];
  if (!untilRaw) return { frequency: 'WEEKLY' };

  const until = untilRaw.length === 8
    ? DateTime.fromFormat(untilRaw, 'yyyyMMdd', { zone: 'utc' }).endOf('day')
    : DateTime.fromFormat(untilRaw, UNTIL_FORMAT, { zone: 'utc' });

  return until.isValid ? { frequency: 'WEEKLY', until } : undefined;
}

/**
 * Occurrences of a weekly entry that overlap [windowStart, windowEnd)
 */
export function expandWeekly(
  start: DateTime,
  end: DateTime,
  rule: WeeklyRule,
  windowStart: DateTime,
  windowEnd: DateTime
): Array<{ start: DateTime; end: DateTime }> {
  const occurrences: Array<{ start: DateTime; end: DateTime }> = [];
  const length = end.diff(start);

  // Skip whole weeks that end before the window
  const weeksToSkip = Math.max(0, Math.floor(windowStart.diff(end, 'weeks').weeks));
  let week = weeksToSkip;

  for (;;) {
    const occurrenceStart = start.plus({ weeks: week });
    if (occurrenceStart >= windowEnd) break;
    if (rule.until && occurrenceStart > rule.until) break;

    const occurrenceEnd = occurrenceStart.plus(length);
    if (occurrenceEnd > windowStart) {
      occurrences.push({ start: occurrenceStart, end: occurrenceEnd });
    }
    week++;
  }

  return occurrences;
}

/**
 * Instance id in the "<master>_<UTC start>" shape calendar stores use
 */
export function instanceId(masterId: string, occurrenceStart: DateTime): string {
  return `${masterId}_${occurrenceStart.toUTC().toFormat(UNTIL_FORMAT)}`;
}
