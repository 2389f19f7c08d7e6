import { describe, it, expect, beforeEach } from 'vitest';
import { BookingService } from '../src/services/booking-service.js';
import { ConflictService } from '../src/services/conflict-service.js';
import { SlotService } from '../src/services/slot-service.js';
import type { MemoryEventStore } from '../src/store/memory/index.js';
import type { Requester } from '../src/types/index.js';
import { ErrorCodes } from '../src/utils/error.js';
import { silentLogger } from '../src/utils/logger.js';
import { FailingStore, at, createClock, createStore, event, klass, win } from './helpers.js';

const alice: Requester = { id: 'alice', role: 'member' };
const bob: Requester = { id: 'bob', role: 'member' };
const admin: Requester = { id: 'dean', role: 'admin' };

describe('BookingService', () => {
  let clock: ReturnType<typeof createClock>;
  let store: MemoryEventStore;
  let service: BookingService;

  const build = (target: MemoryEventStore) => {
    const conflicts = new ConflictService(target, silentLogger);
    return new BookingService(target, conflicts, new SlotService(conflicts, silentLogger), {
      clock: clock.now,
      logger: silentLogger,
    });
  };

  beforeEach(async () => {
    clock = createClock('2026-01-06T12:00:00+05:30');
    store = await createStore(clock.now);
    service = build(store);
    await store.create(klass(win('2026-01-07', '10:00', '11:00'), 'Sem 3'));
  });

  describe('book', () => {
    it('commits a clear window to the temporary calendar', async () => {
      const outcome = await service.book({
        summary: ' Robotics demo ',
        window: win('2026-01-07', '14:00', '15:00'),
        audience: 'Sem 3',
        requester: alice,
        branch: 'CSE',
      });

      expect(outcome.status).toBe('committed');
      if (outcome.status !== 'committed') return;
      expect(outcome.reservation).toMatchObject({
        summary: 'Robotics demo',
        partition: 'transient',
        audienceTag: 'Sem 3',
        branch: 'CSE',
        creator: 'alice',
        window: win('2026-01-07', '14:00', '15:00'),
        createdAt: '2026-01-06T12:00:00+05:30',
      });
    });

    it('commits over a class of another semester', async () => {
      const outcome = await service.book({
        summary: 'Talk',
        window: win('2026-01-07', '10:00', '11:00'),
        audience: 'Sem 5',
        requester: alice,
      });
      expect(outcome.status).toBe('committed');
    });

    it('suggests alternatives on a clash and writes nothing', async () => {
      const outcome = await service.book({
        summary: 'Talk',
        window: win('2026-01-07', '10:00', '11:00'),
        audience: 'Sem 3',
        requester: alice,
      });

      expect(outcome).toMatchObject({
        status: 'suggested',
        conflicts: [{ label: 'Clash with Class: Maths [Sem 3] (10:00 AM - 11:00 AM)' }],
        suggestions: [
          { display: 'Wednesday, 07 Jan | 11:00 AM' },
          { display: 'Wednesday, 07 Jan | 11:30 AM' },
        ],
      });
      expect(await store.listInRange('transient', win('2026-01-07', '00:00', '23:59'))).toEqual([]);
    });

    it('rejects when no alternative exists', async () => {
      await store.create(event(win('2026-01-07', '09:00', '16:00', '2026-01-15'), 'bob'));

      const outcome = await service.book({
        summary: 'Talk',
        window: win('2026-01-07', '10:00', '11:00'),
        audience: 'Sem 5',
        requester: alice,
      });

      expect(outcome.status).toBe('rejected');
      if (outcome.status !== 'rejected') return;
      expect(outcome.conflicts).toHaveLength(1);
    });

    it('fails closed when the store cannot be read', async () => {
      const outcome = await build(new FailingStore()).book({
        summary: 'Talk',
        window: win('2026-01-07', '14:00', '15:00'),
        audience: 'All',
        requester: alice,
      });

      expect(outcome).toEqual({
        status: 'failed',
        failure: {
          kind: 'store-failure',
          label: 'Error checking conflicts: boom',
          code: ErrorCodes.STORE_UNAVAILABLE,
        },
      });
    });

    it('refuses a window that starts in the past', async () => {
      await expect(
        service.book({
          summary: 'Talk',
          window: win('2026-01-05', '10:00', '11:00'),
          audience: 'All',
          requester: alice,
        })
      ).rejects.toMatchObject({ code: ErrorCodes.VALIDATION_ERROR });
    });

    it('refuses an empty summary', async () => {
      await expect(
        service.book({
          summary: '  ',
          window: win('2026-01-07', '14:00', '15:00'),
          audience: 'All',
          requester: alice,
        })
      ).rejects.toMatchObject({ code: ErrorCodes.VALIDATION_ERROR });
    });
  });

  describe('preview', () => {
    it('reports clashes without writing anything', async () => {
      const reports = await service.preview(win('2026-01-07', '10:30', '11:30'), 'Sem 3');

      expect(reports.map(r => r.label)).toEqual(['Clash with Class: Maths [Sem 3] (10:00 AM - 11:00 AM)']);
      expect(await store.listInRange('transient', win('2026-01-07', '00:00', '23:59'))).toEqual([]);
    });

    it('ignores classes of other semesters', async () => {
      expect(await service.preview(win('2026-01-07', '10:30', '11:30'), 'Sem 5')).toEqual([]);
    });
  });

  describe('cancel', () => {
    let bookingId: string;

    beforeEach(async () => {
      const created = await store.create(event(win('2026-01-08', '14:00', '15:00'), 'alice'));
      bookingId = created.id;
    });

    it('lets the creator cancel within 48 hours', async () => {
      clock.advance(47);
      const cancelled = await service.cancel(bookingId, alice);

      expect(cancelled.id).toBe(bookingId);
      await expect(store.get(bookingId)).rejects.toMatchObject({ code: ErrorCodes.NOT_FOUND });
    });

    it('still allows cancellation at exactly 48 hours', async () => {
      clock.advance(48);
      await expect(service.cancel(bookingId, alice)).resolves.toMatchObject({ id: bookingId });
    });

    it('refuses after 48 hours, even for an admin', async () => {
      clock.advance(49);
      await expect(service.cancel(bookingId, alice)).rejects.toMatchObject({
        code: ErrorCodes.RETENTION_WINDOW_EXPIRED,
      });
      await expect(service.cancel(bookingId, admin)).rejects.toMatchObject({
        code: ErrorCodes.RETENTION_WINDOW_EXPIRED,
      });
    });

    it('names the owner when someone else tries', async () => {
      await expect(service.cancel(bookingId, bob)).rejects.toMatchObject({
        code: ErrorCodes.PERMISSION_DENIED,
        message: 'Permission denied: only the creator or an admin may cancel. This booking belongs to alice.',
      });
    });

    it('lets an admin cancel any booking', async () => {
      await expect(service.cancel(bookingId, admin)).resolves.toMatchObject({ creator: 'alice' });
    });

    it('reports unknown ids as not found', async () => {
      await expect(service.cancel('missing', alice)).rejects.toMatchObject({
        code: ErrorCodes.NOT_FOUND,
      });
    });
  });

  describe('cleanupExpired', () => {
    it('removes one-off events that have ended', async () => {
      await store.create(event(win('2026-01-07', '14:00', '15:00')));
      await store.create(event(win('2026-01-09', '14:00', '15:00')));

      clock.set(at('2026-01-08', '09:00'));
      expect(await service.cleanupExpired()).toBe(1);
      expect(await store.listInRange('transient', win('2026-01-01', '00:00', '00:00', '2026-02-01'))).toHaveLength(1);
    });
  });
});
