/**
 * In-process event store
 *
 * Holds both partitions in maps and materialises weekly rules on read, the
 * way the calendar backend does with singleEvents=true. Used for local runs
 * (STORE_BACKEND=memory) and by the test suites.
 */

import { DateTime } from 'luxon';
import type {
  MemoryStoreConfig,
  NewReservation,
  Partition,
  Reservation,
  TimeWindow,
} from '../../types/index.js';
import { ALL_AUDIENCES, SYSTEM_CREATOR } from '../../types/index.js';
import { BaseEventStore } from '../base.js';
import type { Logger } from '../../utils/logger.js';
import { decodeAudienceDescription, encodeAudienceDescription } from '../../utils/audience.js';
import { now, parseDateTime, toISOString } from '../../utils/datetime.js';
import { notFoundError } from '../../utils/error.js';
import { validateTimeRange } from '../../utils/validation.js';
import {
  expandWeekly,
  instanceId,
  parseRecurrenceRule,
} from '../../services/recurrence.js';

interface StoredEntry {
  id: string;
  partition: Partition;
  summary: string;
  description: string;
  start: DateTime;
  end: DateTime;
  recurrenceRule?: string;
  creator: string;
  createdAt: string;
  /** Cancelled occurrence starts (UTC millis) of a recurring entry */
  exceptions: Set<number>;
}

export interface MemoryStoreOptions {
  /** Clock used for createdAt stamps */
  clock?: () => DateTime;
}

const INSTANCE_SUFFIX = /^(.+)_(\d{8}T\d{6}Z)$/;

/**
 * In-memory store implementation
 */
export class MemoryEventStore extends BaseEventStore {
  private readonly entries: Record<Partition, Map<string, StoredEntry>> = {
    recurring: new Map(),
    transient: new Map(),
  };
  private readonly clock: () => DateTime;
  private sequence = 0;

  constructor(config: MemoryStoreConfig, logger?: Logger, options?: MemoryStoreOptions) {
    super(config, logger);
    this.clock = options?.clock ?? (() => now());
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    this._connected = true;
    this.logger.info(`Connected to ${this.displayName}`);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Reservation Operations
  // ─────────────────────────────────────────────────────────────────────────────

  async create(reservation: NewReservation): Promise<Reservation> {
    return this.executeWithErrorHandling('create', async () => {
      this.assertWritableTarget(`memory:${reservation.partition}`, reservation.partition);
      const { start, end } = validateTimeRange(reservation.window.start, reservation.window.end);

      this.sequence += 1;
      const entry: StoredEntry = {
        id: `mem${this.sequence.toString().padStart(6, '0')}`,
        partition: reservation.partition,
        summary: reservation.summary,
        description: encodeAudienceDescription({
          tag: reservation.audienceTag ?? ALL_AUDIENCES,
          branch: reservation.branch,
        }),
        start,
        end,
        recurrenceRule: reservation.partition === 'recurring' ? reservation.recurrenceRule : undefined,
        creator: reservation.creator ?? SYSTEM_CREATOR,
        createdAt: toISOString(this.clock()),
        exceptions: new Set(),
      };

      this.entries[reservation.partition].set(entry.id, entry);
      this.logger.debug(`Created ${entry.partition} reservation ${entry.id}`);
      return this.toReservation(entry, start, end);
    });
  }

  async get(id: string, partition?: Partition): Promise<Reservation> {
    return this.executeWithErrorHandling('get', async () => {
      const partitions: Partition[] = partition ? [partition] : ['transient', 'recurring'];

      for (const p of partitions) {
        const entry = this.entries[p].get(id);
        if (entry) {
          return this.toReservation(entry, entry.start, entry.end);
        }

        const occurrence = this.findOccurrence(p, id);
        if (occurrence) {
          return this.toReservation(occurrence.entry, occurrence.start, occurrence.end, id);
        }
      }

      throw notFoundError(id);
    });
  }

  async delete(id: string, partition: Partition): Promise<void> {
    return this.executeWithErrorHandling('delete', async () => {
      if (this.entries[partition].delete(id)) {
        this.logger.debug(`Deleted ${partition} reservation ${id}`);
        return;
      }

      const occurrence = this.findOccurrence(partition, id);
      if (!occurrence) {
        throw notFoundError(id);
      }
      occurrence.entry.exceptions.add(occurrence.start.toMillis());
      this.logger.debug(`Cancelled occurrence ${id}`);
    });
  }

  async listInRange(partition: Partition, window: TimeWindow): Promise<Reservation[]> {
    return this.executeWithErrorHandling('listInRange', async () => {
      const { start: windowStart, end: windowEnd } = validateTimeRange(window.start, window.end);
      const results: Reservation[] = [];

      for (const entry of this.entries[partition].values()) {
        const rule = entry.recurrenceRule ? parseRecurrenceRule(entry.recurrenceRule) : undefined;

        if (!rule) {
          if (entry.start < windowEnd && entry.end > windowStart) {
            results.push(this.toReservation(entry, entry.start, entry.end));
          }
          continue;
        }

        for (const occurrence of expandWeekly(entry.start, entry.end, rule, windowStart, windowEnd)) {
          if (entry.exceptions.has(occurrence.start.toMillis())) continue;
          results.push(
            this.toReservation(
              entry,
              occurrence.start,
              occurrence.end,
              instanceId(entry.id, occurrence.start)
            )
          );
        }
      }

      return results.sort((a, b) => a.window.start.localeCompare(b.window.start));
    });
  }

  async deleteByAudienceTag(tag: string): Promise<number> {
    return this.executeWithErrorHandling('deleteByAudienceTag', async () => {
      let deleted = 0;
      for (const entry of Array.from(this.entries.recurring.values())) {
        if (decodeAudienceDescription(entry.description).tag === tag) {
          this.entries.recurring.delete(entry.id);
          deleted++;
        }
      }
      this.logger.info(`Deleted ${deleted} recurring reservation(s) tagged ${tag}`);
      return deleted;
    });
  }

  async deletePastTransient(before: string): Promise<number> {
    return this.executeWithErrorHandling('deletePastTransient', async () => {
      const cutoff = parseDateTime(before);
      let deleted = 0;
      for (const entry of Array.from(this.entries.transient.values())) {
        if (entry.end <= cutoff) {
          this.entries.transient.delete(entry.id);
          deleted++;
        }
      }
      this.logger.info(`Deleted ${deleted} past transient reservation(s)`);
      return deleted;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Resolve an instance id "<master>_<yyyyMMddTHHmmssZ>" to its occurrence
   */
  private findOccurrence(
    partition: Partition,
    id: string
  ): { entry: StoredEntry; start: DateTime; end: DateTime } | undefined {
    const match = INSTANCE_SUFFIX.exec(id);
    if (!match?.[1] || !match[2]) return undefined;

    const entry = this.entries[partition].get(match[1]);
    const rule = entry?.recurrenceRule ? parseRecurrenceRule(entry.recurrenceRule) : undefined;
    if (!entry || !rule) return undefined;

    const stamp = DateTime.fromFormat(match[2], "yyyyMMdd'T'HHmmss'Z'", { zone: 'utc' });
    if (!stamp.isValid) return undefined;

    const start = stamp.setZone(entry.start.zone);
    const [occurrence] = expandWeekly(entry.start, entry.end, rule, start, start.plus({ minutes: 1 }));
    if (!occurrence || !occurrence.start.equals(start) || entry.exceptions.has(start.toMillis())) {
      return undefined;
    }
    return { entry, start: occurrence.start, end: occurrence.end };
  }

  private toReservation(entry: StoredEntry, start: DateTime, end: DateTime, id?: string): Reservation {
    const audience = decodeAudienceDescription(entry.description);
    const isInstance = id !== undefined && id !== entry.id;

    return {
      id: id ?? entry.id,
      seriesId: isInstance ? entry.id : undefined,
      partition: entry.partition,
      summary: entry.summary,
      description: entry.description,
      audienceTag: audience.tag,
      branch: audience.branch,
      window: { start: toISOString(start), end: toISOString(end) },
      recurrenceRule: entry.recurrenceRule,
      creator: entry.creator,
      createdAt: entry.createdAt,
    };
  }
}

/**
 * Factory function for creating in-memory stores
 */
export function createMemoryStore(
  config: MemoryStoreConfig,
  logger?: Logger,
  options?: MemoryStoreOptions
): MemoryEventStore {
  return new MemoryEventStore(config, logger, options);
}
