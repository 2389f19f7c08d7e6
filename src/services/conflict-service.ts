/**
 * Conflict Detection Service
 * Audience-aware overlap check across both store partitions
 */

import type {
  AudienceFilter,
  ClashReport,
  ConflictReport,
  IEventStore,
  Reservation,
  StoreFailureReport,
  TimeWindow,
} from '../types/index.js';
import { isAudienceRelevant } from '../utils/audience.js';
import { formatTimeRange, rangesOverlap, toWindow } from '../utils/datetime.js';
import { ErrorCodes, SchedulerError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { validateTimeRange } from '../utils/validation.js';

/**
 * Conflict Detection Service
 */
export class ConflictService {
  private logger: Logger;

  constructor(
    private store: IEventStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('conflicts');
  }

  /**
   * Reports for every relevant reservation overlapping the window.
   *
   * An empty list means the window is free. A store failure yields exactly
   * one store-failure report, never an empty list.
   */
  async findConflicts(window: TimeWindow, filter: AudienceFilter): Promise<ConflictReport[]> {
    const { start, end } = validateTimeRange(window.start, window.end);
    const query = toWindow(start, end);

    let recurring: Reservation[];
    let transient: Reservation[];
    try {
      [recurring, transient] = await Promise.all([
        this.store.listInRange('recurring', query),
        this.store.listInRange('transient', query),
      ]);
    } catch (error) {
      return [this.storeFailure(error)];
    }

    const reports: ConflictReport[] = [];

    for (const reservation of recurring) {
      if (
        rangesOverlap(start, end, reservation.window.start, reservation.window.end) &&
        isAudienceRelevant(filter, reservation.audienceTag)
      ) {
        reports.push(this.toClash(reservation));
      }
    }

    // Transient bookings block every audience
    for (const reservation of transient) {
      if (rangesOverlap(start, end, reservation.window.start, reservation.window.end)) {
        reports.push(this.toClash(reservation));
      }
    }

    this.logger.debug(`${reports.length} conflict(s) for ${window.start} - ${window.end}`);
    return reports;
  }

  private toClash(reservation: Reservation): ClashReport {
    const timeRange = formatTimeRange(reservation.window.start, reservation.window.end);
    const label =
      reservation.partition === 'transient'
        ? `Clash with Event: ${reservation.summary} (${timeRange})`
        : `Clash with Class: ${reservation.summary} [${reservation.audienceTag}] (${timeRange})`;

    return {
      kind: 'clash',
      label,
      partition: reservation.partition,
      audienceTag: reservation.partition === 'recurring' ? reservation.audienceTag : undefined,
      timeRange,
      reservationId: reservation.id,
      summary: reservation.summary,
      window: reservation.window,
    };
  }

  private storeFailure(error: unknown): StoreFailureReport {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Conflict check failed: ${message}`);
    return {
      kind: 'store-failure',
      label: `Error checking conflicts: ${message}`,
      code: error instanceof SchedulerError ? error.code : ErrorCodes.STORE_UNAVAILABLE,
    };
  }
}

/**
 * Split a report list into clashes and the store failure, if any
 */
export function partitionReports(reports: ConflictReport[]): {
  clashes: ClashReport[];
  failure?: StoreFailureReport;
} {
  const clashes: ClashReport[] = [];
  let failure: StoreFailureReport | undefined;
  for (const report of reports) {
    if (report.kind === 'clash') {
      clashes.push(report);
    } else if (!failure) {
      failure = report;
    }
  }
  return { clashes, failure };
}

/**
 * Singleton service instance
 */
let serviceInstance: ConflictService | null = null;

/**
 * Get or create the conflict service
 */
export function getConflictService(store: IEventStore, logger?: Logger): ConflictService {
  if (!serviceInstance) {
    serviceInstance = new ConflictService(store, logger);
  }
  return serviceInstance;
}

/**
 * Reset the service
 */
export function resetConflictService(): void {
  serviceInstance = null;
}
