/**
 * Core reservation data types
 * The unified model every store backend maps to and from
 */

/**
 * Storage partition: weekly-repeating timetable entries vs one-off bookings
 */
export type Partition = 'recurring' | 'transient';

/**
 * Sentinel audience meaning "applies to everyone"
 */
export const ALL_AUDIENCES = 'All';

/**
 * A cohort label such as "Sem 3", or the sentinel "All"
 */
export type AudienceTag = string;

/**
 * Query filter: the sentinel, a single tag, or a set of tags
 */
export type AudienceFilter = AudienceTag | readonly AudienceTag[];

/**
 * Creator recorded for entries written by a batch sync
 */
export const SYSTEM_CREATOR = 'system';

export type DayOfWeek =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

/**
 * Half-open time window [start, end), ISO 8601 with explicit offset
 */
export interface TimeWindow {
  start: string;
  end: string;
}

/**
 * A reservation on the shared calendar
 */
export interface Reservation {
  // ─────────────────────────────────────────────────────────────────────────────
  // Identifiers
  // ─────────────────────────────────────────────────────────────────────────────
  /** Store-assigned identifier (an instance id for materialized occurrences) */
  id: string;
  /** Master entry id when this is an occurrence of a recurring entry */
  seriesId?: string;
  partition: Partition;

  // ─────────────────────────────────────────────────────────────────────────────
  // Content
  // ─────────────────────────────────────────────────────────────────────────────
  summary: string;
  /** Raw stored description (carries the canonical audience string) */
  description?: string;
  audienceTag: AudienceTag;
  branch?: string;

  // ─────────────────────────────────────────────────────────────────────────────
  // Timing
  // ─────────────────────────────────────────────────────────────────────────────
  window: TimeWindow;
  /** Weekly repeat-until rule, recurring entries only */
  recurrenceRule?: string;

  // ─────────────────────────────────────────────────────────────────────────────
  // Ownership
  // ─────────────────────────────────────────────────────────────────────────────
  /** Identity string, or "system" for synced entries */
  creator: string;
  createdAt: string;
}

/**
 * Input for creating a reservation
 */
export interface NewReservation {
  summary: string;
  window: TimeWindow;
  partition: Partition;
  audienceTag?: AudienceTag;
  branch?: string;
  creator?: string;
  recurrenceRule?: string;
}

/**
 * The identity behind a request. Passed on every call; the core keeps no
 * session state.
 */
export interface Requester {
  id: string;
  role: 'admin' | 'member';
}
