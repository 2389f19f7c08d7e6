import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictService } from '../src/services/conflict-service.js';
import { MAX_SUGGESTIONS, SlotService } from '../src/services/slot-service.js';
import type { MemoryEventStore } from '../src/store/memory/index.js';
import { ErrorCodes } from '../src/utils/error.js';
import { silentLogger } from '../src/utils/logger.js';
import { FailingStore, at, createStore, event, klass, win } from './helpers.js';

describe('SlotService', () => {
  let store: MemoryEventStore;
  let service: SlotService;

  beforeEach(async () => {
    store = await createStore();
    service = new SlotService(new ConflictService(store, silentLogger), silentLogger);
  });

  it('starts at 09:00 when the reference is earlier in the day', async () => {
    const slots = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'All');

    expect(slots).toEqual([
      { start: at('2026-01-07', '09:00'), end: at('2026-01-07', '10:00'), display: 'Wednesday, 07 Jan | 09:00 AM' },
      { start: at('2026-01-07', '09:30'), end: at('2026-01-07', '10:30'), display: 'Wednesday, 07 Jan | 09:30 AM' },
    ]);
  });

  it('never suggests a time before the reference on the same day', async () => {
    const slots = await service.suggestSlots({ start: at('2026-01-07', '10:10') }, 60, 'All');
    expect(slots.map(s => s.start)).toEqual([at('2026-01-07', '10:10'), at('2026-01-07', '10:40')]);
  });

  it('falls back to the 15:00-16:00 buffer and then the next day', async () => {
    await store.create(event(win('2026-01-07', '09:00', '15:00')));

    const slots = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'All');
    expect(slots.map(s => s.display)).toEqual([
      'Wednesday, 07 Jan | 03:00 PM',
      'Thursday, 08 Jan | 09:00 AM',
    ]);
  });

  it('skips a preferred window filled by back-to-back bookings', async () => {
    for (const [from, to] of [
      ['09:00', '10:00'],
      ['10:00', '11:00'],
      ['11:00', '12:00'],
      ['12:00', '13:00'],
      ['13:00', '14:00'],
      ['14:00', '15:00'],
    ] as const) {
      await store.create(event(win('2026-01-07', from, to)));
    }

    const slots = await service.suggestSlots({ start: at('2026-01-07', '10:00') }, 60, 'All');
    expect(slots.map(s => s.start)).toEqual([at('2026-01-07', '15:00'), at('2026-01-08', '09:00')]);
  });

  it('never ends a slot after 16:00', async () => {
    const slots = await service.suggestSlots({ start: at('2026-01-07', '15:30') }, 60, 'All');
    expect(slots.map(s => s.start)).toEqual([at('2026-01-08', '09:00'), at('2026-01-08', '09:30')]);
  });

  it('skips windows blocked by classes of the audience only', async () => {
    await store.create(klass(win('2026-01-07', '09:00', '12:00'), 'Sem 3'));

    const sem3 = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'Sem 3');
    expect(sem3[0]?.start).toBe(at('2026-01-07', '12:00'));

    const sem5 = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'Sem 5');
    expect(sem5[0]?.start).toBe(at('2026-01-07', '09:00'));
  });

  it('returns at most two suggestions', async () => {
    const slots = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 30, 'All');
    expect(slots).toHaveLength(MAX_SUGGESTIONS);
  });

  it('honours the allowed weekdays', async () => {
    const slots = await service.suggestSlots(
      { start: at('2026-01-07', '08:00') },
      60,
      'All',
      ['friday']
    );
    expect(slots.map(s => s.display)).toEqual([
      'Friday, 09 Jan | 09:00 AM',
      'Friday, 09 Jan | 09:30 AM',
    ]);
  });

  it('treats an empty weekday list as no eligible day', async () => {
    expect(await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'All', [])).toEqual([]);
  });

  it('returns nothing when every day of the horizon is booked', async () => {
    await store.create(event(win('2026-01-07', '09:00', '16:00', '2026-01-15')));

    const slots = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'All');
    expect(slots).toEqual([]);
  });

  it('returns nothing for a duration longer than any window', async () => {
    const slots = await service.suggestSlots({ start: at('2026-01-07', '08:00') }, 420, 'All');
    expect(slots).toEqual([]);
  });

  it('rejects a non-positive duration', async () => {
    await expect(
      service.suggestSlots({ start: at('2026-01-07', '08:00') }, 0, 'All')
    ).rejects.toMatchObject({ code: ErrorCodes.VALIDATION_ERROR });
  });

  it('fails instead of searching blind when the store is down', async () => {
    const failing = new SlotService(new ConflictService(new FailingStore(), silentLogger), silentLogger);

    await expect(
      failing.suggestSlots({ start: at('2026-01-07', '08:00') }, 60, 'All')
    ).rejects.toMatchObject({
      code: ErrorCodes.STORE_UNAVAILABLE,
      message: 'Error checking conflicts: boom',
    });
  });
});
