/**
 * Google Calendar data mapping
 * Converts between Google Calendar events and our Reservation format
 */

import type { calendar_v3 } from 'googleapis';
import type { NewReservation, Partition, Reservation } from '../../types/index.js';
import { ALL_AUDIENCES, SYSTEM_CREATOR } from '../../types/index.js';
import { decodeAudienceDescription, encodeAudienceDescription } from '../../utils/audience.js';
import { parseDateTime, parseLocalDate, toISOString } from '../../utils/datetime.js';
import { validationError } from '../../utils/error.js';

type GoogleEvent = calendar_v3.Schema$Event;
type GoogleEventDateTime = calendar_v3.Schema$EventDateTime;

/**
 * Shared extended property holding the booking owner
 */
export const CREATOR_PROPERTY = 'creator_email';

/**
 * Parse Google's datetime (handles both dateTime and all-day date formats)
 */
function parseGoogleDateTime(value: GoogleEventDateTime | undefined, field: string): string {
  if (value?.dateTime) {
    return toISOString(parseDateTime(value.dateTime));
  }
  // All-day event uses date field (YYYY-MM-DD)
  if (value?.date) {
    return toISOString(parseLocalDate(value.date));
  }
  throw validationError(`Event has no ${field} time`);
}

/**
 * All-day entries (date only) are markers, not bookings: they never block a window
 */
export function isTimedEvent(event: GoogleEvent): boolean {
  return Boolean(event.start?.dateTime && event.end?.dateTime);
}

/**
 * Map a Google event to a Reservation
 */
export function mapGoogleEvent(event: GoogleEvent, partition: Partition): Reservation {
  const audience = decodeAudienceDescription(event.description);
  const start = parseGoogleDateTime(event.start, 'start');
  const end = parseGoogleDateTime(event.end, 'end');
  const createdRaw = event.created ?? event.updated;

  return {
    id: event.id ?? '',
    seriesId: event.recurringEventId ?? undefined,
    partition,
    summary: event.summary ?? '(untitled)',
    description: event.description ?? undefined,
    audienceTag: audience.tag,
    branch: audience.branch,
    window: { start, end },
    recurrenceRule: event.recurrence?.find(rule => rule.startsWith('RRULE:')),
    creator: event.extendedProperties?.shared?.[CREATOR_PROPERTY] ?? SYSTEM_CREATOR,
    createdAt: createdRaw ? toISOString(parseDateTime(createdRaw)) : start,
  };
}

/**
 * Convert a new reservation to a Google event body
 */
export function toGoogleEvent(reservation: NewReservation, timeZone: string): GoogleEvent {
  const event: GoogleEvent = {
    summary: reservation.summary,
    description: encodeAudienceDescription({
      tag: reservation.audienceTag ?? ALL_AUDIENCES,
      branch: reservation.branch,
    }),
    start: { dateTime: reservation.window.start, timeZone },
    end: { dateTime: reservation.window.end, timeZone },
    extendedProperties: {
      shared: { [CREATOR_PROPERTY]: reservation.creator ?? SYSTEM_CREATOR },
    },
  };

  if (reservation.partition === 'recurring' && reservation.recurrenceRule) {
    event.recurrence = [reservation.recurrenceRule];
  }

  return event;
}
