/**
 * Slot Suggestion Service
 * Walks forward from a reference time and returns the first conflict-free
 * windows inside operating hours.
 */

import type { AudienceFilter, DayOfWeek, Slot, TimeWindow } from '../types/index.js';
import { formatSlotDisplay, parseDateTime, toISOString } from '../utils/datetime.js';
import { ErrorCodes, SchedulerError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validatePositiveInteger } from '../utils/validation.js';
import { partitionReports, type ConflictService } from './conflict-service.js';
import { weekdayOf } from './recurrence.js';

export const SEARCH_HORIZON_DAYS = 8;
export const STEP_MINUTES = 30;
export const MAX_SUGGESTIONS = 2;

/**
 * Sub-windows probed each day, in order: preferred, then buffer
 */
export const SEARCH_WINDOWS: ReadonlyArray<{ startHour: number; endHour: number }> = [
  { startHour: 9, endHour: 15 },
  { startHour: 15, endHour: 16 },
];

/**
 * Slot Suggestion Service
 */
export class SlotService {
  private logger: Logger;

  constructor(
    private conflicts: ConflictService,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('slots');
  }

  /**
   * Up to two conflict-free windows of `durationMinutes`, in discovery order
   */
  async suggestSlots(
    referenceWindow: Pick<TimeWindow, 'start'>,
    durationMinutes: number,
    filter: AudienceFilter,
    allowedWeekdays?: readonly DayOfWeek[]
  ): Promise<Slot[]> {
    validatePositiveInteger(durationMinutes, 'durationMinutes');
    const base = parseDateTime(referenceWindow.start);
    // A supplied list is taken literally: an empty one leaves no eligible day
    const allowed = allowedWeekdays ? new Set(allowedWeekdays) : undefined;
    const slots: Slot[] = [];

    for (let dayOffset = 0; dayOffset < SEARCH_HORIZON_DAYS; dayOffset++) {
      const day = base.plus({ days: dayOffset });
      if (allowed && !allowed.has(weekdayOf(day))) continue;

      for (const { startHour, endHour } of SEARCH_WINDOWS) {
        let candidate = day.set({ hour: startHour, minute: 0, second: 0, millisecond: 0 });
        const limit = day.set({ hour: endHour, minute: 0, second: 0, millisecond: 0 });

        // Never suggest a time before the reference on its own day
        if (dayOffset === 0 && base > candidate) {
          candidate = base;
        }

        while (candidate.plus({ minutes: durationMinutes }) <= limit) {
          const end = candidate.plus({ minutes: durationMinutes });
          const window = { start: toISOString(candidate), end: toISOString(end) };
          const { clashes, failure } = partitionReports(
            await this.conflicts.findConflicts(window, filter)
          );

          if (failure) {
            throw new SchedulerError(failure.label, ErrorCodes.STORE_UNAVAILABLE, {
              retryable: true,
              details: { code: failure.code },
            });
          }

          if (clashes.length === 0) {
            slots.push({ ...window, display: formatSlotDisplay(candidate) });
            if (slots.length >= MAX_SUGGESTIONS) {
              return slots;
            }
          }

          candidate = candidate.plus({ minutes: STEP_MINUTES });
        }
      }
    }

    this.logger.debug(`Found ${slots.length} slot(s) within ${SEARCH_HORIZON_DAYS} days`);
    return slots;
  }
}

/**
 * Singleton service instance
 */
let serviceInstance: SlotService | null = null;

/**
 * Get or create the slot service
 */
export function getSlotService(conflicts: ConflictService, logger?: Logger): SlotService {
  if (!serviceInstance) {
    serviceInstance = new SlotService(conflicts, logger);
  }
  return serviceInstance;
}

/**
 * Reset the service
 */
export function resetSlotService(): void {
  serviceInstance = null;
}
