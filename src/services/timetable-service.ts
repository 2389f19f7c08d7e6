/**
 * Timetable Sync Service
 * Batch path: extracted timetable -> weekly recurring reservations
 */

import type {
  ExtractedTimetable,
  IEventStore,
  Requester,
  Reservation,
  TimetableEvent,
} from '../types/index.js';
import { SYSTEM_CREATOR } from '../types/index.js';
import {
  DEFAULT_BRANCH,
  encodeAudienceDescription,
  normalizeSemesterTag,
} from '../utils/audience.js';
import { atClockTime, parseLocalDate, toISOString } from '../utils/datetime.js';
import { adminRequiredError, isFatalError, validationError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validateClockTime, validateDateRange } from '../utils/validation.js';
import { buildRecurrenceRule, firstOccurrence } from './recurrence.js';

export const SYNC_SUMMARY_PREFIX = '[Sync] ';

/**
 * Per-event sync outcome
 */
export type SyncResult =
  | { ok: true; event: TimetableEvent; reservation: Reservation }
  | { ok: false; event: TimetableEvent; error: string };

export interface SyncReport {
  audienceTag: string;
  branch: string;
  created: number;
  failed: number;
  results: SyncResult[];
}

/**
 * Timetable Sync Service
 */
export class TimetableService {
  private logger: Logger;

  constructor(
    private store: IEventStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('timetable');
  }

  /**
   * Canonical tag and branch, with every description rewritten to the
   * "Semester: <tag> | Branch: <branch>" form
   */
  normalize(raw: ExtractedTimetable): ExtractedTimetable {
    const tag = normalizeSemesterTag(raw.metadata.semester);
    const branch = raw.metadata.branch.trim() || DEFAULT_BRANCH;
    const description = encodeAudienceDescription({ tag, branch });

    return {
      metadata: { semester: tag, branch },
      events: raw.events.map(event => ({ ...event, description })),
    };
  }

  /**
   * Write one weekly recurring reservation per timetable row
   */
  async sync(
    timetable: ExtractedTimetable,
    semesterStart: string,
    semesterEnd: string,
    requester: Requester
  ): Promise<SyncReport> {
    if (requester.role !== 'admin') {
      throw adminRequiredError('timetable sync');
    }

    const { start, end } = validateDateRange(semesterStart, semesterEnd);
    const normalized = this.normalize(timetable);
    const { semester: tag, branch } = normalized.metadata;
    const rule = buildRecurrenceRule(end);
    const results: SyncResult[] = [];

    for (const event of normalized.events) {
      try {
        const startClock = validateClockTime(event.start_time);
        const endClock = validateClockTime(event.end_time);
        const date = parseLocalDate(firstOccurrence(start, event.day));

        if (date > end) {
          throw validationError(`No ${event.day} falls between ${semesterStart} and ${semesterEnd}`);
        }

        const reservation = await this.store.create({
          summary: `${SYNC_SUMMARY_PREFIX}${event.summary}`,
          window: {
            start: toISOString(atClockTime(date, startClock)),
            end: toISOString(atClockTime(date, endClock)),
          },
          partition: 'recurring',
          audienceTag: tag,
          branch,
          creator: SYSTEM_CREATOR,
          recurrenceRule: rule,
        });
        results.push({ ok: true, event, reservation });
      } catch (error) {
        if (isFatalError(error)) throw error;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed to sync "${event.summary}": ${message}`);
        results.push({ ok: false, event, error: message });
      }
    }

    const created = results.filter(result => result.ok).length;
    this.logger.info(`Synced ${created}/${results.length} event(s) for ${tag}`);

    return { audienceTag: tag, branch, created, failed: results.length - created, results };
  }

  /**
   * Remove every recurring reservation carrying the tag
   */
  async rollback(tag: string, requester: Requester): Promise<number> {
    if (requester.role !== 'admin') {
      throw adminRequiredError('sync rollback');
    }
    return this.store.deleteByAudienceTag(normalizeSemesterTag(tag));
  }
}

/**
 * Singleton service instance
 */
let serviceInstance: TimetableService | null = null;

/**
 * Get or create the timetable service
 */
export function getTimetableService(store: IEventStore, logger?: Logger): TimetableService {
  if (!serviceInstance) {
    serviceInstance = new TimetableService(store, logger);
  }
  return serviceInstance;
}

/**
 * Reset the service
 */
export function resetTimetableService(): void {
  serviceInstance = null;
}
