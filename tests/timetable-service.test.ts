import { describe, it, expect, beforeEach } from 'vitest';
import { SYNC_SUMMARY_PREFIX, TimetableService } from '../src/services/timetable-service.js';
import type { MemoryEventStore } from '../src/store/memory/index.js';
import type { ExtractedTimetable, Requester } from '../src/types/index.js';
import { ErrorCodes } from '../src/utils/error.js';
import { silentLogger } from '../src/utils/logger.js';
import { createStore, win } from './helpers.js';

const admin: Requester = { id: 'dean', role: 'admin' };
const member: Requester = { id: 'alice', role: 'member' };

const mathsRow = { summary: 'Maths', day: 'Wednesday', start_time: '10:00', end_time: '11:00', description: '' };

const timetable: ExtractedTimetable = {
  metadata: { semester: '3rd Semester', branch: 'CSE' },
  events: [
    mathsRow,
    { summary: 'Lab', day: 'Funday', start_time: '14:00', end_time: '16:00', description: '' },
    { summary: 'Physics', day: 'Thu', start_time: '9:30', end_time: '10:30', description: 'room 4' },
  ],
};

describe('TimetableService', () => {
  let store: MemoryEventStore;
  let service: TimetableService;

  beforeEach(async () => {
    store = await createStore();
    service = new TimetableService(store, silentLogger);
  });

  it('normalizes the tag and rewrites every description', () => {
    const normalized = service.normalize(timetable);

    expect(normalized.metadata).toEqual({ semester: 'Sem 3', branch: 'CSE' });
    expect(normalized.events.map(e => e.description)).toEqual([
      'Semester: Sem 3 | Branch: CSE',
      'Semester: Sem 3 | Branch: CSE',
      'Semester: Sem 3 | Branch: CSE',
    ]);
  });

  it('falls back to the default branch', () => {
    const normalized = service.normalize({ metadata: { semester: 'Sem 2', branch: ' ' }, events: [] });
    expect(normalized.metadata.branch).toBe('Unknown Branch');
  });

  it('creates one weekly entry per row and reports failures per row', async () => {
    const report = await service.sync(timetable, '2026-01-05', '2026-04-10', admin);

    expect(report).toMatchObject({ audienceTag: 'Sem 3', branch: 'CSE', created: 2, failed: 1 });
    expect(report.results.map(r => r.ok)).toEqual([true, false, true]);

    const [maths, lab, physics] = report.results;
    expect(maths?.ok && maths.reservation).toMatchObject({
      summary: `${SYNC_SUMMARY_PREFIX}Maths`,
      partition: 'recurring',
      audienceTag: 'Sem 3',
      branch: 'CSE',
      creator: 'system',
      window: win('2026-01-07', '10:00', '11:00'),
      recurrenceRule: 'RRULE:FREQ=WEEKLY;UNTIL=20260410T235959Z',
    });
    expect(lab?.ok === false && lab.error).toBe('Unknown weekday "Funday"');
    expect(physics?.ok && physics.reservation.window).toEqual(win('2026-01-08', '09:30', '10:30'));
  });

  it('repeats weekly until the semester end', async () => {
    const report = await service.sync(timetable, '2026-01-05', '2026-04-10', admin);
    const masterId = report.results[0]?.ok ? report.results[0].reservation.id : '';

    const week2 = await store.listInRange('recurring', win('2026-01-14', '00:00', '23:59'));
    expect(week2.map(r => r.id)).toEqual([`${masterId}_20260114T043000Z`]);

    expect(await store.listInRange('recurring', win('2026-04-08', '00:00', '23:59'))).toHaveLength(1);
    expect(await store.listInRange('recurring', win('2026-04-15', '00:00', '23:59'))).toEqual([]);
  });

  it('fails a row whose weekday never falls inside the semester', async () => {
    const report = await service.sync(timetable, '2026-01-05', '2026-01-06', admin);

    expect(report.created).toBe(0);
    expect(report.results[0]).toMatchObject({
      ok: false,
      error: 'No Wednesday falls between 2026-01-05 and 2026-01-06',
    });
  });

  it('rejects an inverted semester', async () => {
    await expect(service.sync(timetable, '2026-04-10', '2026-01-05', admin)).rejects.toMatchObject({
      code: ErrorCodes.INVALID_DATE_RANGE,
    });
  });

  it('is admin only', async () => {
    await expect(service.sync(timetable, '2026-01-05', '2026-04-10', member)).rejects.toMatchObject({
      code: ErrorCodes.PERMISSION_DENIED,
    });
    await expect(service.rollback('Sem 3', member)).rejects.toMatchObject({
      code: ErrorCodes.PERMISSION_DENIED,
    });
  });

  it('rolls back exactly one semester, idempotently', async () => {
    await service.sync(timetable, '2026-01-05', '2026-04-10', admin);
    await service.sync(
      { metadata: { semester: 'Sem 5', branch: 'IT' }, events: [mathsRow] },
      '2026-01-05',
      '2026-04-10',
      admin
    );

    expect(await service.rollback('3rd sem', admin)).toBe(2);
    expect(await service.rollback('Sem 3', admin)).toBe(0);

    const left = await store.listInRange('recurring', win('2026-01-07', '00:00', '23:59'));
    expect(left.map(r => r.audienceTag)).toEqual(['Sem 5']);
  });
});
