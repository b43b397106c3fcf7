import { InMemoryEventBus, createRequestContext } from '@kitchenflow/core';
import type { RequestContext } from '@kitchenflow/core';
import type { KitchenSettingsInput } from '@kitchenflow/shared';
import { configureKds } from '../runtime';
import { InMemoryKitchenStore } from '../store/in-memory-store';
import { InMemoryStationDirectory } from '../stations';
import { StaticSettingsProvider } from '../settings';
import type { KitchenStore } from '../store/types';
import type { Ticket } from '../types';
import type { KitchenOrderInput } from '../validation';

export const HUB = 'hub-1';
export const OTHER_HUB = 'hub-2';
export const T0 = new Date('2026-03-01T18:00:00.000Z');

export function cook(hubId = HUB, id = 'cook-1'): RequestContext {
  return createRequestContext(hubId, { id, type: 'user', name: 'Line Cook' }, { requestId: `req-${id}` });
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: 'ticket-1',
    hubId: HUB,
    orderId: 'order-1',
    orderLineId: 'line-1',
    itemId: 'item-burger',
    itemName: 'Burger',
    quantity: 1,
    stationId: 'grill',
    state: 'received',
    priority: 0,
    notes: null,
    createdAt: T0,
    acceptedAt: null,
    startedAt: null,
    bumpedAt: null,
    completedAt: null,
    servedAt: null,
    cancelledAt: null,
    lastTransitionAt: T0,
    version: 1,
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<KitchenOrderInput> = {}): KitchenOrderInput {
  return {
    orderId: 'order-1',
    orderNumber: 'A12',
    lines: [
      { lineId: 'line-1', itemId: 'item-burger', itemName: 'Burger', stationId: 'grill' },
      { lineId: 'line-2', itemId: 'item-fries', itemName: 'Fries', quantity: 2, stationId: 'fry' },
    ],
    ...overrides,
  };
}

interface SetupOptions {
  settings?: KitchenSettingsInput;
  store?: KitchenStore;
}

export function setupKds(options: SetupOptions = {}) {
  const memory = new InMemoryKitchenStore();
  const stations = new InMemoryStationDirectory([
    { id: 'grill', hubId: HUB, name: 'Grill', isActive: true },
    { id: 'fry', hubId: HUB, name: 'Fryer', isActive: true },
    { id: 'pastry', hubId: HUB, name: 'Pastry', isActive: false },
    { id: 'grill', hubId: OTHER_HUB, name: 'Grill', isActive: true },
  ]);
  const settings = new StaticSettingsProvider({ [HUB]: options.settings ?? {} });
  const bus = new InMemoryEventBus();
  configureKds({ store: options.store ?? memory, stations, settings, bus });
  return { store: memory, stations, settings, bus };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}
