/**
 * Booking Service
 *
 * Lifecycle of a one-off booking:
 *   Proposed -> Conflict-detected -> Suggested | Rejected
 *   Proposed -> Clear -> Committed -> Cancelled (48 h, owner or admin)
 *
 * The store exposes no conditional write, so `book` re-runs the conflict
 * check immediately before `create`. Two writers racing between that check
 * and the write can still double-book; this window is narrowed, not closed.
 */

import type { DateTime } from 'luxon';
import type {
  AudienceFilter,
  BookingOutcome,
  BookingRequest,
  ConflictReport,
  IEventStore,
  Requester,
  Reservation,
  StoreFailureReport,
  TimeWindow,
} from '../types/index.js';
import { normalizeAudienceFilter, tagForBooking } from '../utils/audience.js';
import { durationMinutes, now, parseDateTime, toISOString } from '../utils/datetime.js';
import {
  ErrorCodes,
  SchedulerError,
  isFatalError,
  permissionDeniedError,
  retentionWindowExpiredError,
  validationError,
} from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validateNonEmptyString, validateTimeRange } from '../utils/validation.js';
import { partitionReports, type ConflictService } from './conflict-service.js';
import type { SlotService } from './slot-service.js';

export const CANCELLATION_WINDOW_HOURS = 48;

export interface BookingServiceOptions {
  /** Current time source */
  clock?: () => DateTime;
  logger?: Logger;
}

/**
 * Booking Service
 */
export class BookingService {
  private readonly clock: () => DateTime;
  private logger: Logger;

  constructor(
    private store: IEventStore,
    private conflicts: ConflictService,
    private slots: SlotService,
    options?: BookingServiceOptions
  ) {
    this.clock = options?.clock ?? (() => now());
    this.logger = options?.logger ?? createLogger('booking');
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Proposal
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Advisory conflict check; `book` always re-checks before writing
   */
  async preview(window: TimeWindow, audience: AudienceFilter): Promise<ConflictReport[]> {
    return this.conflicts.findConflicts(window, normalizeAudienceFilter(audience));
  }

  /**
   * Check, then commit or suggest alternatives
   */
  async book(request: BookingRequest): Promise<BookingOutcome> {
    validateNonEmptyString(request.summary, 'summary');
    const { start, end } = validateTimeRange(request.window.start, request.window.end);
    if (start < this.clock()) {
      throw validationError('Cannot book a window that starts in the past', {
        start: request.window.start,
      });
    }

    const filter = normalizeAudienceFilter(request.audience);
    const { clashes, failure } = partitionReports(
      await this.conflicts.findConflicts(request.window, filter)
    );

    if (failure) {
      return { status: 'failed', failure };
    }

    if (clashes.length > 0) {
      try {
        const suggestions = await this.slots.suggestSlots(
          request.window,
          Math.ceil(durationMinutes(start, end)),
          filter,
          request.allowedWeekdays
        );
        return suggestions.length > 0
          ? { status: 'suggested', conflicts: clashes, suggestions }
          : { status: 'rejected', conflicts: clashes };
      } catch (error) {
        return { status: 'failed', failure: this.toFailure('Error finding alternatives', error) };
      }
    }

    try {
      const reservation = await this.store.create({
        summary: request.summary.trim(),
        window: { start: toISOString(start), end: toISOString(end) },
        partition: 'transient',
        audienceTag: tagForBooking(filter),
        branch: request.branch,
        creator: request.requester.id,
      });
      this.logger.info(`Booked ${reservation.id} for ${request.requester.id}`);
      return { status: 'committed', reservation };
    } catch (error) {
      if (isFatalError(error)) throw error;
      return { status: 'failed', failure: this.toFailure('Booking failed', error) };
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Cancellation and Expiry
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Cancel a transient booking: owner or admin, within 48 h of creation
   */
  async cancel(reservationId: string, requester: Requester): Promise<Reservation> {
    const reservation = await this.store.get(reservationId, 'transient');

    if (requester.role !== 'admin' && requester.id !== reservation.creator) {
      throw permissionDeniedError('only the creator or an admin may cancel', reservation.creator);
    }

    const ageHours = this.clock().diff(parseDateTime(reservation.createdAt), 'hours').hours;
    if (ageHours > CANCELLATION_WINDOW_HOURS) {
      throw retentionWindowExpiredError(reservationId, CANCELLATION_WINDOW_HOURS);
    }

    await this.store.delete(reservationId, 'transient');
    this.logger.info(`Cancelled ${reservationId} for ${requester.id}`);
    return reservation;
  }

  /**
   * Remove transient bookings that have already ended
   */
  async cleanupExpired(): Promise<number> {
    return this.store.deletePastTransient(toISOString(this.clock()));
  }

  private toFailure(prefix: string, error: unknown): StoreFailureReport {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${prefix}: ${message}`);
    return {
      kind: 'store-failure',
      label: `${prefix}: ${message}`,
      code: error instanceof SchedulerError ? error.code : ErrorCodes.STORE_UNAVAILABLE,
    };
  }
}

/**
 * Singleton service instance
 */
let serviceInstance: BookingService | null = null;

/**
 * Get or create the booking service
 */
export function getBookingService(
  store: IEventStore,
  conflicts: ConflictService,
  slots: SlotService
): BookingService {
  if (!serviceInstance) {
    serviceInstance = new BookingService(store, conflicts, slots);
  }
  return serviceInstance;
}

/**
 * Reset the service
 */
export function resetBookingService(): void {
  serviceInstance = null;
}
