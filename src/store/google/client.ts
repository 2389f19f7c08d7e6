/**
 * Google Calendar API client wrapper
 */

import { google } from 'googleapis';
import type { calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { GaxiosResponse } from 'gaxios';
import {
  ErrorCodes,
  SchedulerError,
  notFoundError,
  quotaExceededError,
} from '../../utils/error.js';

type Calendar = calendar_v3.Calendar;
type Event = calendar_v3.Schema$Event;
type CalendarList = calendar_v3.Schema$CalendarList;
type CalendarListEntry = calendar_v3.Schema$CalendarListEntry;
type Events = calendar_v3.Schema$Events;

export interface GoogleClientOptions {
  /** Per-request timeout in ms */
  timeout: number;
}

/**
 * Status and reason pulled from a gaxios error
 */
interface ApiErrorInfo {
  status?: number;
  reason?: string;
  message: string;
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Narrow an unknown gaxios failure to the fields the mapping needs
 */
export function describeApiError(error: unknown): ApiErrorInfo {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  const response: unknown = Reflect.get(error, 'response');
  const status =
    readNumber(error, 'status') ??
    readNumber(error, 'code') ??
    (typeof response === 'object' && response !== null ? readNumber(response, 'status') : undefined);

  let reason: string | undefined;
  const errors: unknown = Reflect.get(error, 'errors');
  if (Array.isArray(errors)) {
    const first: unknown = errors[0];
    if (typeof first === 'object' && first !== null) {
      const value: unknown = Reflect.get(first, 'reason');
      reason = typeof value === 'string' ? value : undefined;
    }
  }

  return { status, reason, message };
}

/**
 * Google Calendar API client wrapper
 * Provides typed methods for the calendar operations the store needs
 */
export class GoogleCalendarClient {
  private calendar: Calendar;
  private readonly timeout: number;

  constructor(auth: OAuth2Client, options: GoogleClientOptions) {
    this.calendar = google.calendar({ version: 'v3', auth });
    this.timeout = options.timeout;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Calendar Operations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * List all calendars accessible to the user
   */
  async listCalendars(): Promise<CalendarListEntry[]> {
    try {
      const calendars: CalendarListEntry[] = [];
      let pageToken: string | undefined;

      do {
        const response: GaxiosResponse<CalendarList> = await this.calendar.calendarList.list(
          { pageToken, maxResults: 250 },
          { timeout: this.timeout }
        );

        if (response.data.items) {
          calendars.push(...response.data.items);
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      return calendars;
    } catch (error) {
      throw this.handleApiError(error, 'listCalendars');
    }
  }

  /**
   * Create a secondary calendar
   */
  async createCalendar(summary: string, timeZone: string): Promise<calendar_v3.Schema$Calendar> {
    try {
      const response = await this.calendar.calendars.insert(
        { requestBody: { summary, timeZone } },
        { timeout: this.timeout }
      );
      return response.data;
    } catch (error) {
      throw this.handleApiError(error, 'createCalendar');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Event Operations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * List events in a calendar, following every page
   */
  async listEvents(params: {
    calendarId: string;
    timeMin?: string;
    timeMax?: string;
    q?: string;
    singleEvents: boolean;
  }): Promise<Event[]> {
    try {
      const events: Event[] = [];
      let pageToken: string | undefined;

      do {
        const response: GaxiosResponse<Events> = await this.calendar.events.list(
          {
            calendarId: params.calendarId,
            timeMin: params.timeMin,
            timeMax: params.timeMax,
            q: params.q,
            maxResults: 2500,
            singleEvents: params.singleEvents,
            orderBy: params.singleEvents ? 'startTime' : undefined,
            pageToken,
          },
          { timeout: this.timeout }
        );

        if (response.data.items) {
          events.push(...response.data.items);
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      return events;
    } catch (error) {
      throw this.handleApiError(error, 'listEvents');
    }
  }

  /**
   * Get a single event (or instance) by ID
   */
  async getEvent(calendarId: string, eventId: string): Promise<Event> {
    try {
      const response = await this.calendar.events.get(
        { calendarId, eventId },
        { timeout: this.timeout }
      );
      return response.data;
    } catch (error) {
      throw this.handleApiError(error, 'getEvent', eventId);
    }
  }

  /**
   * Create a new event
   */
  async createEvent(calendarId: string, event: Event): Promise<Event> {
    try {
      const response = await this.calendar.events.insert(
        { calendarId, requestBody: event, sendUpdates: 'none' },
        { timeout: this.timeout }
      );
      return response.data;
    } catch (error) {
      throw this.handleApiError(error, 'createEvent');
    }
  }

  /**
   * Delete an event
   */
  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    try {
      await this.calendar.events.delete(
        { calendarId, eventId, sendUpdates: 'none' },
        { timeout: this.timeout }
      );
    } catch (error) {
      throw this.handleApiError(error, 'deleteEvent', eventId);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Error Handling
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Convert Google API errors to our error format
   */
  private handleApiError(error: unknown, operation: string, resourceId?: string): SchedulerError {
    const { status, reason, message } = describeApiError(error);
    const cause = error instanceof Error ? error : undefined;

    switch (status) {
      case 401:
        return new SchedulerError(`Authentication failed: ${message}`, ErrorCodes.AUTH_FAILED, {
          cause,
        });

      case 403:
        if (reason === 'rateLimitExceeded' || reason === 'userRateLimitExceeded') {
          return quotaExceededError('Google Calendar', 60, cause);
        }
        return new SchedulerError(`${operation} failed: ${message}`, ErrorCodes.STORE_UNAVAILABLE, {
          retryable: false,
          cause,
          details: { status, reason },
        });

      case 404:
      case 410:
        return resourceId
          ? notFoundError(resourceId)
          : new SchedulerError('Resource not found', ErrorCodes.NOT_FOUND, { cause });

      case 429:
        return quotaExceededError('Google Calendar', 60, cause);

      default:
        return new SchedulerError(`${operation} failed: ${message}`, ErrorCodes.STORE_UNAVAILABLE, {
          retryable: status === undefined || status >= 500,
          cause,
          details: { status, reason },
        });
    }
  }
}
