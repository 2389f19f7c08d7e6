/**
 * Conflict, slot and booking lifecycle types
 */

import type { AudienceFilter, DayOfWeek, Partition, Requester, Reservation, TimeWindow } from './reservation.js';
import type { ErrorCode } from '../utils/error.js';

/**
 * A relevant reservation blocking the queried window
 */
export interface ClashReport {
  kind: 'clash';
  /** Human-readable explanation of what is blocking */
  label: string;
  partition: Partition;
  audienceTag?: string;
  /** Display time range, e.g. "10:00 AM - 11:00 AM" */
  timeRange: string;
  reservationId: string;
  summary: string;
  window: TimeWindow;
}

/**
 * Synthetic report emitted when the store could not be queried.
 * Never an empty list: that would read as "available".
 */
export interface StoreFailureReport {
  kind: 'store-failure';
  label: string;
  code: ErrorCode;
}

export type ConflictReport = ClashReport | StoreFailureReport;

/**
 * A conflict-free alternative window
 */
export interface Slot {
  start: string;
  end: string;
  /** e.g. "Wednesday, 07 Jan | 10:00 AM" */
  display: string;
}

/**
 * A booking request for the transient partition
 */
export interface BookingRequest {
  summary: string;
  window: TimeWindow;
  audience: AudienceFilter;
  requester: Requester;
  /** Restrict suggestions to these weekdays */
  allowedWeekdays?: readonly DayOfWeek[];
  branch?: string;
}

/**
 * Outcome of Proposed -> {Conflict-detected -> [Suggested | Rejected]} | {Clear -> Committed}
 */
export type BookingOutcome =
  | { status: 'committed'; reservation: Reservation }
  | { status: 'suggested'; conflicts: ClashReport[]; suggestions: Slot[] }
  | { status: 'rejected'; conflicts: ClashReport[] }
  | { status: 'failed'; failure: StoreFailureReport };
