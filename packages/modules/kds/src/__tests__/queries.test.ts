import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ValidationError } from '@kitchenflow/shared';
import { setLogSink } from '@kitchenflow/core';
import { routeOrder } from '../commands/route-order';
import { transition } from '../commands/apply-transition';
import { changePriority } from '../commands/change-priority';
import { getTicket } from '../queries/get-ticket';
import { listActive } from '../queries/list-active';
import { listReady } from '../queries/list-ready';
import { collectHistory, listHistory } from '../queries/list-history';
import { countTicketsByState } from '../queries/count-tickets-by-state';
import { getOrderProgress } from '../queries/get-order-progress';
import { TicketNotFoundError } from '../errors';
import { resetKds } from '../runtime';
import type { KitchenOrderInput } from '../validation';
import { T0, collect, cook, setupKds } from './helpers';

const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

function lines(count: number, stationId = 'grill'): KitchenOrderInput['lines'] {
  return Array.from({ length: count }, (_, i) => ({
    lineId: `line-${i + 1}`,
    itemId: `item-${i + 1}`,
    itemName: `Item ${i + 1}`,
    stationId,
  }));
}

async function ticketIds(orderId: string, count: number, stationId = 'grill', priority = 0): Promise<string[]> {
  const { tickets } = await routeOrder(cook(), { orderId, priority, lines: lines(count, stationId) });
  return tickets.map((t) => t.id);
}

describe('kitchen queries', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
    setLogSink(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    setLogSink();
    resetKds();
  });

  describe('listActive', () => {
    it('lists working tickets by priority, then age, with urgency', async () => {
      setupKds({ settings: { warningThresholdSeconds: 300, criticalThresholdSeconds: 600 } });
      const [oldest] = await ticketIds('order-1', 1);
      vi.setSystemTime(at(100));
      const [newer] = await ticketIds('order-2', 1, 'fry');
      vi.setSystemTime(at(200));
      const [rush] = await ticketIds('order-3', 1, 'grill', 5);
      vi.setSystemTime(at(400));

      const page = await listActive(cook());

      expect(page.items.map((t) => t.id)).toEqual([rush, oldest, newer]);
      expect(page.items.map((t) => [t.elapsedSeconds, t.urgency])).toEqual([
        [200, 'normal'],
        [400, 'warning'],
        [300, 'warning'],
      ]);
      expect(page).toMatchObject({ page: 1, pageSize: 12, total: 3 });
    });

    it('leaves out bumped and finished tickets', async () => {
      setupKds();
      const [a, b] = await ticketIds('order-1', 2);
      if (!a || !b) throw new Error('expected tickets');
      for (const trigger of ['accept', 'start', 'bump'] as const) await transition(cook(), a, trigger);
      await transition(cook(), b, 'cancel');

      const page = await listActive(cook());
      expect(page.total).toBe(0);
    });

    it('filters by station', async () => {
      setupKds();
      await ticketIds('order-1', 2, 'grill');
      const [fry] = await ticketIds('order-2', 1, 'fry');
      const page = await listActive(cook(), { stationId: 'fry' });
      expect(page.items.map((t) => t.id)).toEqual([fry]);
    });

    it('pages by the hub itemsPerPage', async () => {
      setupKds({ settings: { itemsPerPage: 2 } });
      const ids = await ticketIds('order-1', 5);

      const second = await listActive(cook(), { page: 2 });
      expect(second.items.map((t) => t.id)).toEqual(ids.slice(2, 4));
      expect(second).toMatchObject({ page: 2, pageSize: 2, total: 5 });

      const beyond = await listActive(cook(), { page: 4 });
      expect(beyond.items).toEqual([]);
    });

    it('rejects page zero', async () => {
      setupKds();
      await expect(listActive(cook(), { page: 0 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('listReady', () => {
    it('orders the pass by priority then bump time', async () => {
      setupKds();
      const [a, b, c] = await ticketIds('order-1', 3);
      if (!a || !b || !c) throw new Error('expected tickets');
      for (const id of [a, b, c]) {
        await transition(cook(), id, 'accept');
        await transition(cook(), id, 'start');
      }
      vi.setSystemTime(at(10));
      await transition(cook(), b, 'bump');
      vi.setSystemTime(at(20));
      await transition(cook(), a, 'bump');
      vi.setSystemTime(at(30));
      await transition(cook(), c, 'bump');
      await changePriority(cook(), { ticketId: c, priority: 1 });

      const ready = await listReady(cook());
      expect(ready.map((t) => t.id)).toEqual([c, b, a]);
    });
  });

  describe('getTicket', () => {
    it('returns the annotated ticket', async () => {
      setupKds();
      const [id] = await ticketIds('order-1', 1);
      if (!id) throw new Error('expected a ticket');
      vi.setSystemTime(at(42));
      const ticket = await getTicket(cook(), id);
      expect(ticket).toMatchObject({ id, state: 'received', elapsedSeconds: 42, urgency: 'normal' });
    });

    it('throws for an unknown ticket', async () => {
      setupKds();
      await expect(getTicket(cook(), 'missing')).rejects.toBeInstanceOf(TicketNotFoundError);
    });
  });

  describe('history', () => {
    it('streams the audit log with filters', async () => {
      setupKds();
      const [id] = await ticketIds('order-1', 1);
      if (!id) throw new Error('expected a ticket');
      await transition(cook(), id, 'accept');
      await ticketIds('order-2', 1);

      const forOrder = await collect(listHistory(cook(), { orderId: 'order-1' }));
      expect(forOrder.map((e) => e.action)).toEqual(['received', 'accepted']);

      const accepted = await collect(listHistory(cook(), { action: 'accepted', actorId: 'cook-1' }));
      expect(accepted.map((e) => e.ticketId)).toEqual([id]);
    });

    it('caps buffered history at 50 by default', async () => {
      setupKds();
      await ticketIds('order-1', 60);
      expect(await collectHistory(cook())).toHaveLength(50);
      expect(await collectHistory(cook(), { limit: 55 })).toHaveLength(55);
    });

    it('rejects a window that ends before it starts', () => {
      setupKds();
      expect(() => listHistory(cook(), { from: at(10), to: at(5) })).toThrow(ValidationError);
    });
  });

  describe('getOrderProgress', () => {
    it('reports each ticket of the order and whether the pass can send it', async () => {
      setupKds();
      const [a, b, c] = await ticketIds('order-1', 3);
      if (!a || !b || !c) throw new Error('expected tickets');
      await ticketIds('order-2', 1);
      for (const trigger of ['accept', 'start', 'bump'] as const) await transition(cook(), a, trigger);
      await transition(cook(), c, 'cancel');

      const pending = await getOrderProgress(cook(), 'order-1');
      expect(pending.tickets.map((t) => t.id)).toEqual([a, b, c]);
      expect(pending.counts).toEqual({
        received: 1,
        accepted: 0,
        in_progress: 0,
        bumped: 1,
        completed: 0,
        served: 0,
        cancelled: 1,
      });
      expect(pending.ready).toBe(false);

      for (const trigger of ['accept', 'start', 'bump', 'complete'] as const) await transition(cook(), b, trigger);
      const done = await getOrderProgress(cook(), 'order-1');
      expect(done.counts.completed).toBe(1);
      expect(done.ready).toBe(true);
    });

    it('is never ready for an unknown or fully cancelled order', async () => {
      setupKds();
      const [id] = await ticketIds('order-1', 1);
      if (!id) throw new Error('expected a ticket');
      await transition(cook(), id, 'cancel');

      expect((await getOrderProgress(cook(), 'order-1')).ready).toBe(false);
      const unknown = await getOrderProgress(cook(), 'missing');
      expect(unknown.tickets).toEqual([]);
      expect(unknown.ready).toBe(false);
    });
  });

  describe('countTicketsByState', () => {
    it('counts each open state and the active total', async () => {
      setupKds();
      const [a, b, c, d] = await ticketIds('order-1', 4);
      if (!a || !b || !c || !d) throw new Error('expected tickets');
      await transition(cook(), a, 'accept');
      await transition(cook(), b, 'accept');
      await transition(cook(), b, 'start');
      await transition(cook(), c, 'cancel');

      expect(await countTicketsByState(cook())).toEqual({
        received: 1,
        accepted: 1,
        inProgress: 1,
        bumped: 0,
        completed: 0,
        active: 3,
      });
    });
  });
});
