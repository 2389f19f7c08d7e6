import { DateTime } from 'luxon';
import type { NewReservation, Partition, Reservation, TimeWindow } from '../src/types/index.js';
import { MemoryEventStore } from '../src/store/memory/index.js';
import { silentLogger } from '../src/utils/logger.js';

export const OFFSET = '+05:30';

/**
 * "2026-01-07", "10:00" -> "2026-01-07T10:00:00+05:30"
 */
export const at = (date: string, time: string): string => `${date}T${time}:00${OFFSET}`;

export const win = (date: string, from: string, to: string, endDate = date): TimeWindow => ({
  start: at(date, from),
  end: at(endDate, to),
});

/**
 * Mutable test clock shared by a store and the services over it
 */
export function createClock(iso: string) {
  let current = DateTime.fromISO(iso, { setZone: true });
  return {
    now: () => current,
    set: (value: string) => {
      current = DateTime.fromISO(value, { setZone: true });
    },
    advance: (hours: number) => {
      current = current.plus({ hours });
    },
  };
}

export async function createStore(clock?: () => DateTime): Promise<MemoryEventStore> {
  const store = new MemoryEventStore(
    { type: 'memory', id: 'memory', name: 'Test store' },
    silentLogger,
    { clock }
  );
  await store.connect();
  return store;
}

export function klass(
  window: TimeWindow,
  audienceTag: string,
  summary = 'Maths',
  recurrenceRule = 'RRULE:FREQ=WEEKLY;UNTIL=20260410T235959Z'
): NewReservation {
  return { summary, window, partition: 'recurring', audienceTag, creator: 'system', recurrenceRule };
}

export function event(window: TimeWindow, creator = 'alice', summary = 'Club meet', audienceTag = 'All'): NewReservation {
  return { summary, window, partition: 'transient', audienceTag, creator };
}

/**
 * Store whose reads always fail
 */
export class FailingStore extends MemoryEventStore {
  constructor() {
    super({ type: 'memory', id: 'failing', name: 'Failing store' }, silentLogger);
    this._connected = true;
  }

  async listInRange(_partition: Partition, _window: TimeWindow): Promise<Reservation[]> {
    throw new Error('boom');
  }
}
