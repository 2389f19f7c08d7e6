/**
 * Google Calendar store implementation
 *
 * Each partition lives in its own named secondary calendar. The calendars are
 * resolved (or created) at connect time and the store never falls back to the
 * account's primary calendar.
 */

import type { OAuth2Client } from 'google-auth-library';
import type {
  GoogleStoreConfig,
  NewReservation,
  Partition,
  Reservation,
  TimeWindow,
} from '../../types/index.js';
import { BaseEventStore } from '../base.js';
import type { Logger } from '../../utils/logger.js';
import { getConfig } from '../../utils/config.js';
import { decodeAudienceDescription } from '../../utils/audience.js';
import { parseDateTime, toISOString } from '../../utils/datetime.js';
import { ErrorCodes, SchedulerError, notFoundError } from '../../utils/error.js';
import { createOAuth2Client, ensureValidCredentials } from './auth.js';
import { GoogleCalendarClient } from './client.js';
import { isTimedEvent, mapGoogleEvent, toGoogleEvent } from './mapper.js';

export interface GoogleStoreOptions {
  /** IANA zone stamped on created calendars and events */
  timezone?: string;
  /** Per-request timeout in ms */
  timeout?: number;
  /** Prebuilt client (tests) */
  client?: GoogleCalendarClient;
}

const PARTITIONS: readonly Partition[] = ['transient', 'recurring'];

/**
 * Google Calendar store implementation
 */
export class GoogleEventStore extends BaseEventStore {
  private oauth2Client: OAuth2Client;
  private client: GoogleCalendarClient | null;
  private calendarIds: Partial<Record<Partition, string>> = {};
  private readonly timezone: string;
  private readonly timeout: number;

  constructor(
    private readonly googleConfig: GoogleStoreConfig,
    logger?: Logger,
    options?: GoogleStoreOptions
  ) {
    super(googleConfig, logger);
    this.oauth2Client = createOAuth2Client(googleConfig);
    this.client = options?.client ?? null;
    this.timezone = options?.timezone ?? getConfig().defaults.timezone;
    this.timeout = options?.timeout ?? getConfig().request.timeout;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    this.logger.info(`Connecting to Google Calendar (${this.displayName})...`);

    try {
      if (!this.client) {
        await ensureValidCredentials(this.oauth2Client);
        this.client = new GoogleCalendarClient(this.oauth2Client, { timeout: this.timeout });
      }

      this.calendarIds = await this.resolveCalendars(this.client);

      this._connected = true;
      this.logger.info(`Connected to Google Calendar (${this.displayName})`);
    } catch (error) {
      this._connected = false;
      throw this.wrapError(error, 'connect');
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    this.calendarIds = {};
    this._connected = false;
    this.logger.info(`Disconnected from Google Calendar (${this.displayName})`);
  }

  private getClient(): GoogleCalendarClient {
    if (!this.client) {
      throw new SchedulerError(
        'Google Calendar client not initialized. Call connect() first.',
        ErrorCodes.STORE_UNAVAILABLE,
        { retryable: true, details: { storeId: this.storeId } }
      );
    }
    return this.client;
  }

  /**
   * Find both partition calendars by name, creating any that is missing
   */
  private async resolveCalendars(
    client: GoogleCalendarClient
  ): Promise<Record<Partition, string>> {
    const existing = await client.listCalendars();
    const names: Record<Partition, string> = {
      recurring: this.googleConfig.recurringCalendarName,
      transient: this.googleConfig.transientCalendarName,
    };

    const resolve = async (partition: Partition): Promise<string> => {
      const found = existing.find(entry => entry.summary === names[partition] && entry.id);
      if (found?.id) {
        return found.id;
      }

      this.logger.info(`Creating calendar "${names[partition]}"`);
      const created = await client.createCalendar(names[partition], this.timezone);
      return this.assertWritableTarget(created.id ?? undefined, partition);
    };

    return {
      recurring: await resolve('recurring'),
      transient: await resolve('transient'),
    };
  }

  private calendarFor(partition: Partition): string {
    return this.assertWritableTarget(this.calendarIds[partition], partition);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Reservation Operations
  // ─────────────────────────────────────────────────────────────────────────────

  async create(reservation: NewReservation): Promise<Reservation> {
    return this.executeWithErrorHandling('create', async () => {
      const calendarId = this.calendarFor(reservation.partition);
      const created = await this.getClient().createEvent(
        calendarId,
        toGoogleEvent(reservation, this.timezone)
      );
      return mapGoogleEvent(created, reservation.partition);
    });
  }

  async get(id: string, partition?: Partition): Promise<Reservation> {
    return this.executeWithErrorHandling('get', async () => {
      for (const p of partition ? [partition] : PARTITIONS) {
        try {
          const event = await this.getClient().getEvent(this.calendarFor(p), id);
          if (event.status !== 'cancelled') {
            return mapGoogleEvent(event, p);
          }
        } catch (error) {
          if (!(error instanceof SchedulerError && error.code === ErrorCodes.NOT_FOUND)) {
            throw error;
          }
        }
      }
      throw notFoundError(id);
    });
  }

  async delete(id: string, partition: Partition): Promise<void> {
    return this.executeWithErrorHandling('delete', async () => {
      await this.getClient().deleteEvent(this.calendarFor(partition), id);
    });
  }

  async listInRange(partition: Partition, window: TimeWindow): Promise<Reservation[]> {
    return this.executeWithErrorHandling('listInRange', async () => {
      const events = await this.getClient().listEvents({
        calendarId: this.calendarFor(partition),
        timeMin: toISOString(parseDateTime(window.start)),
        timeMax: toISOString(parseDateTime(window.end)),
        singleEvents: true,
      });

      return events
        .filter(event => event.status !== 'cancelled' && isTimedEvent(event))
        .map(event => mapGoogleEvent(event, partition));
    });
  }

  async deleteByAudienceTag(tag: string): Promise<number> {
    return this.executeWithErrorHandling('deleteByAudienceTag', async () => {
      const calendarId = this.calendarFor('recurring');
      const events = await this.getClient().listEvents({
        calendarId,
        q: `Semester: ${tag}`,
        singleEvents: false,
      });

      // Full-text search is fuzzy; only exact decoded tags are removed
      const targets = events.filter(
        event =>
          event.id &&
          event.status !== 'cancelled' &&
          decodeAudienceDescription(event.description).tag === tag
      );

      let deleted = 0;
      for (const event of targets) {
        if (event.id) {
          await this.getClient().deleteEvent(calendarId, event.id);
          deleted++;
        }
      }

      this.logger.info(`Deleted ${deleted} recurring reservation(s) tagged ${tag}`);
      return deleted;
    });
  }

  async deletePastTransient(before: string): Promise<number> {
    return this.executeWithErrorHandling('deletePastTransient', async () => {
      const calendarId = this.calendarFor('transient');
      const cutoff = parseDateTime(before);
      const events = await this.getClient().listEvents({
        calendarId,
        timeMax: before,
        singleEvents: true,
      });

      let deleted = 0;
      for (const event of events) {
        if (!event.id || event.status === 'cancelled') continue;
        const reservation = mapGoogleEvent(event, 'transient');
        if (parseDateTime(reservation.window.end) <= cutoff) {
          await this.getClient().deleteEvent(calendarId, event.id);
          deleted++;
        }
      }

      this.logger.info(`Deleted ${deleted} past transient reservation(s)`);
      return deleted;
    });
  }
}

/**
 * Factory function for creating Google Calendar stores
 */
export function createGoogleStore(
  config: GoogleStoreConfig,
  logger?: Logger,
  options?: GoogleStoreOptions
): GoogleEventStore {
  return new GoogleEventStore(config, logger, options);
}
