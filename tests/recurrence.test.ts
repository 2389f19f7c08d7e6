import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  buildRecurrenceRule,
  expandWeekly,
  firstOccurrence,
  instanceId,
  parseRecurrenceRule,
  parseWeekday,
} from '../src/services/recurrence.js';
import { SchedulerError } from '../src/utils/error.js';

describe('firstOccurrence', () => {
  it('finds the first matching weekday on or after the start', () => {
    expect(firstOccurrence('2026-01-05', 'Wednesday')).toBe('2026-01-07');
    expect(firstOccurrence('2026-01-05', 'Monday')).toBe('2026-01-05');
    expect(firstOccurrence('2026-01-05', 'Sunday')).toBe('2026-01-11');
  });

  it('is stable when applied to its own result', () => {
    const first = firstOccurrence('2026-01-05', 'fri');
    expect(firstOccurrence(first, 'fri')).toBe(first);
  });

  it('rejects unknown weekdays', () => {
    expect(() => firstOccurrence('2026-01-05', 'Someday')).toThrow(SchedulerError);
    expect(() => firstOccurrence('2026-01-05', 'Someday')).toThrow('Unknown weekday "Someday"');
  });
});

describe('parseWeekday', () => {
  it('accepts full names and prefixes in any case', () => {
    expect(parseWeekday('THURSDAY')).toBe('thursday');
    expect(parseWeekday('thu')).toBe('thursday');
    expect(parseWeekday(' Sat ')).toBe('saturday');
  });

  it('rejects prefixes shorter than three letters', () => {
    expect(() => parseWeekday('th')).toThrow('Unknown weekday "th"');
  });
});

describe('recurrence rules', () => {
  it('repeats weekly through the end of the last day', () => {
    expect(buildRecurrenceRule('2026-04-10')).toBe('RRULE:FREQ=WEEKLY;UNTIL=20260410T235959Z');
  });

  it('parses its own rules', () => {
    const rule = parseRecurrenceRule('RRULE:FREQ=WEEKLY;UNTIL=20260410T235959Z');
    expect(rule?.frequency).toBe('WEEKLY');
    expect(rule?.until?.toISO()).toBe('2026-04-10T23:59:59.000Z');
  });

  it('ignores rules that are not weekly', () => {
    expect(parseRecurrenceRule('RRULE:FREQ=DAILY;COUNT=3')).toBeUndefined();
  });
});

describe('expandWeekly', () => {
  const start = DateTime.fromISO('2026-01-07T10:00:00Z', { zone: 'utc' });
  const end = start.plus({ hours: 1 });

  it('returns only the occurrences overlapping the window', () => {
    const occurrences = expandWeekly(
      start,
      end,
      { frequency: 'WEEKLY' },
      DateTime.fromISO('2026-01-13T00:00:00Z', { zone: 'utc' }),
      DateTime.fromISO('2026-01-29T00:00:00Z', { zone: 'utc' })
    );
    expect(occurrences.map(o => o.start.toISODate())).toEqual(['2026-01-14', '2026-01-21', '2026-01-28']);
  });

  it('stops at the until instant', () => {
    const occurrences = expandWeekly(
      start,
      end,
      { frequency: 'WEEKLY', until: DateTime.fromISO('2026-01-14T23:59:59Z', { zone: 'utc' }) },
      start,
      start.plus({ weeks: 10 })
    );
    expect(occurrences).toHaveLength(2);
  });
});

describe('instanceId', () => {
  it('appends the UTC start', () => {
    const occurrence = DateTime.fromISO('2026-01-14T10:00:00+05:30', { setZone: true });
    expect(instanceId('abc', occurrence)).toBe('abc_20260114T043000Z');
  });
});
