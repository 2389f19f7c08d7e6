import { describe, it, expect, beforeEach } from 'vitest';
import type { calendar_v3 } from 'googleapis';
import { createOAuth2Client } from '../src/store/google/auth.js';
import { GoogleCalendarClient, describeApiError } from '../src/store/google/client.js';
import { GoogleEventStore } from '../src/store/google/index.js';
import { CREATOR_PROPERTY, isTimedEvent, mapGoogleEvent, toGoogleEvent } from '../src/store/google/mapper.js';
import { ConflictService } from '../src/services/conflict-service.js';
import type { GoogleStoreConfig } from '../src/types/index.js';
import { ErrorCodes } from '../src/utils/error.js';
import { silentLogger } from '../src/utils/logger.js';
import { at, event, win } from './helpers.js';

type ListParams = Parameters<GoogleCalendarClient['listEvents']>[0];

const config: GoogleStoreConfig = {
  type: 'google',
  id: 'google-test',
  name: 'Google (test)',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  recurringCalendarName: 'Semester Static Calendar',
  transientCalendarName: 'Club Temporary Events',
};

/**
 * In-process stand-in for the Calendar API
 */
class FakeCalendarClient extends GoogleCalendarClient {
  calendars: calendar_v3.Schema$CalendarListEntry[] = [];
  createdCalendarId?: string;
  events: Record<string, calendar_v3.Schema$Event[]> = {};
  inserted: Array<{ calendarId: string; event: calendar_v3.Schema$Event }> = [];
  queries: ListParams[] = [];
  deleted: string[] = [];

  constructor() {
    super(createOAuth2Client(config), { timeout: 1000 });
  }

  async listCalendars(): Promise<calendar_v3.Schema$CalendarListEntry[]> {
    return this.calendars;
  }

  async createCalendar(summary: string): Promise<calendar_v3.Schema$Calendar> {
    return { id: this.createdCalendarId ?? `cal-${summary}`, summary };
  }

  async listEvents(params: ListParams): Promise<calendar_v3.Schema$Event[]> {
    this.queries.push(params);
    return this.events[params.calendarId] ?? [];
  }

  async createEvent(calendarId: string, body: calendar_v3.Schema$Event): Promise<calendar_v3.Schema$Event> {
    this.inserted.push({ calendarId, event: body });
    return { ...body, id: 'evt1', created: '2026-01-06T06:30:00Z' };
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    this.deleted.push(`${calendarId}/${eventId}`);
  }
}

describe('GoogleEventStore', () => {
  let client: FakeCalendarClient;
  let store: GoogleEventStore;

  beforeEach(() => {
    client = new FakeCalendarClient();
    store = new GoogleEventStore(config, silentLogger, {
      client,
      timezone: 'Asia/Kolkata',
      timeout: 1000,
    });
  });

  it('creates missing partition calendars and writes into them', async () => {
    await store.connect();
    const created = await store.create(event(win('2026-01-07', '14:00', '15:00'), 'alice'));

    expect(client.inserted[0]?.calendarId).toBe('cal-Club Temporary Events');
    expect(created).toMatchObject({
      id: 'evt1',
      partition: 'transient',
      creator: 'alice',
      createdAt: '2026-01-06T12:00:00+05:30',
    });
  });

  it('refuses to write into the primary calendar', async () => {
    client.calendars = [
      { id: 'primary', summary: 'Club Temporary Events' },
      { id: 'rec', summary: 'Semester Static Calendar' },
    ];
    await store.connect();

    await expect(store.create(event(win('2026-01-07', '14:00', '15:00')))).rejects.toMatchObject({
      code: ErrorCodes.INVARIANT_VIOLATION,
    });
    expect(client.inserted).toEqual([]);
  });

  it('refuses a created calendar that resolves to the default one', async () => {
    client.createdCalendarId = 'primary';
    await expect(store.connect()).rejects.toMatchObject({ code: ErrorCodes.INVARIANT_VIOLATION });
    expect(store.isConnected()).toBe(false);
  });

  it('rolls back only exact tag matches from the recurring calendar', async () => {
    client.calendars = [
      { id: 'tmp', summary: 'Club Temporary Events' },
      { id: 'rec', summary: 'Semester Static Calendar' },
    ];
    client.events['rec'] = [
      { id: 'a', description: 'Semester: Sem 3 | Branch: CSE' },
      { id: 'b', description: 'Semester: Sem 30 | Branch: CSE' },
      { id: 'c', description: 'Semester: Sem 3 | Branch: IT', status: 'cancelled' },
    ];
    await store.connect();

    expect(await store.deleteByAudienceTag('Sem 3')).toBe(1);
    expect(client.deleted).toEqual(['rec/a']);
    expect(client.queries[0]).toEqual({ calendarId: 'rec', q: 'Semester: Sem 3', singleEvents: false });
  });

  it('lists materialized instances and skips cancelled ones', async () => {
    client.calendars = [
      { id: 'tmp', summary: 'Club Temporary Events' },
      { id: 'rec', summary: 'Semester Static Calendar' },
    ];
    client.events['rec'] = [
      {
        id: 'm_20260114T043000Z',
        recurringEventId: 'm',
        summary: '[Sync] Maths',
        description: 'Semester: Sem 3 | Branch: CSE',
        start: { dateTime: '2026-01-14T04:30:00Z' },
        end: { dateTime: '2026-01-14T05:30:00Z' },
      },
      { id: 'gone', status: 'cancelled', start: { dateTime: '2026-01-14T06:00:00Z' }, end: { dateTime: '2026-01-14T07:00:00Z' } },
    ];
    await store.connect();

    const listed = await store.listInRange('recurring', win('2026-01-14', '00:00', '23:59'));
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({
      seriesId: 'm',
      audienceTag: 'Sem 3',
      window: win('2026-01-14', '10:00', '11:00'),
    });
    expect(client.queries[0]?.singleEvents).toBe(true);
  });

  describe('with the conflict service', () => {
    let conflicts: ConflictService;

    beforeEach(async () => {
      client.calendars = [
        { id: 'tmp', summary: 'Club Temporary Events' },
        { id: 'rec', summary: 'Semester Static Calendar' },
      ];
      await store.connect();
      conflicts = new ConflictService(store, silentLogger);
    });

    it('queries with offset-qualified bounds even for naive input', async () => {
      await conflicts.findConflicts({ start: '2026-01-07T10:00:00', end: '2026-01-07T11:00:00' }, 'All');

      expect(client.queries.map(query => [query.timeMin, query.timeMax])).toEqual([
        ['2026-01-07T10:00:00+05:30', '2026-01-07T11:00:00+05:30'],
        ['2026-01-07T10:00:00+05:30', '2026-01-07T11:00:00+05:30'],
      ]);
    });

    it('ignores all-day markers in the one-off calendar', async () => {
      client.events['tmp'] = [
        { id: 'holiday', summary: 'Holiday marker', start: { date: '2026-01-07' }, end: { date: '2026-01-08' } },
      ];

      expect(await conflicts.findConflicts(win('2026-01-07', '10:00', '11:00'), 'Sem 3')).toEqual([]);
    });
  });
});

describe('Google mapper', () => {
  it('maps times into the scheduling offset and reads the creator', () => {
    const reservation = mapGoogleEvent(
      {
        id: 'e1',
        summary: 'Quiz',
        description: 'Semester: Sem 2 | Branch: IT',
        start: { dateTime: '2026-01-07T04:30:00Z' },
        end: { dateTime: '2026-01-07T05:30:00Z' },
        created: '2026-01-06T06:30:00Z',
        extendedProperties: { shared: { [CREATOR_PROPERTY]: 'alice' } },
      },
      'transient'
    );

    expect(reservation).toEqual({
      id: 'e1',
      seriesId: undefined,
      partition: 'transient',
      summary: 'Quiz',
      description: 'Semester: Sem 2 | Branch: IT',
      audienceTag: 'Sem 2',
      branch: 'IT',
      window: win('2026-01-07', '10:00', '11:00'),
      recurrenceRule: undefined,
      creator: 'alice',
      createdAt: '2026-01-06T12:00:00+05:30',
    });
  });

  it('fills in missing metadata', () => {
    const reservation = mapGoogleEvent(
      { id: 'e2', start: { dateTime: '2026-01-07T04:30:00Z' }, end: { dateTime: '2026-01-07T05:30:00Z' } },
      'recurring'
    );

    expect(reservation.audienceTag).toBe('All');
    expect(reservation.creator).toBe('system');
    expect(reservation.createdAt).toBe(at('2026-01-07', '10:00'));
  });

  it('treats date-only entries as untimed', () => {
    expect(isTimedEvent({ start: { date: '2026-01-07' }, end: { date: '2026-01-08' } })).toBe(false);
    expect(
      isTimedEvent({ start: { dateTime: '2026-01-07T04:30:00Z' }, end: { dateTime: '2026-01-07T05:30:00Z' } })
    ).toBe(true);
  });

  it('writes the recurrence only for recurring entries', () => {
    const rule = 'RRULE:FREQ=WEEKLY;UNTIL=20260410T235959Z';
    const recurring = toGoogleEvent(
      { summary: 'Maths', window: win('2026-01-07', '10:00', '11:00'), partition: 'recurring', audienceTag: 'Sem 3', recurrenceRule: rule },
      'Asia/Kolkata'
    );
    const transient = toGoogleEvent(
      { summary: 'Talk', window: win('2026-01-07', '10:00', '11:00'), partition: 'transient', recurrenceRule: rule },
      'Asia/Kolkata'
    );

    expect(recurring).toMatchObject({
      description: 'Semester: Sem 3 | Branch: Unknown Branch',
      start: { dateTime: at('2026-01-07', '10:00'), timeZone: 'Asia/Kolkata' },
      recurrence: [rule],
      extendedProperties: { shared: { [CREATOR_PROPERTY]: 'system' } },
    });
    expect(transient.recurrence).toBeUndefined();
  });
});

describe('describeApiError', () => {
  it('reads status and reason from a gaxios-shaped error', () => {
    const error = Object.assign(new Error('Rate Limit Exceeded'), {
      response: { status: 403 },
      errors: [{ reason: 'rateLimitExceeded' }],
    });
    expect(describeApiError(error)).toEqual({
      status: 403,
      reason: 'rateLimitExceeded',
      message: 'Rate Limit Exceeded',
    });
  });

  it('copes with non-object failures', () => {
    expect(describeApiError('nope')).toEqual({ message: 'nope' });
  });
});
