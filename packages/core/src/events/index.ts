import type { EventBus } from './bus';
import { InMemoryEventBus } from './in-memory-bus';

let eventBus: EventBus | null = null;

export function getEventBus(): EventBus {
  if (!eventBus) {
    eventBus = new InMemoryEventBus();
  }
  return eventBus;
}

export function setEventBus(bus: EventBus): void {
  eventBus = bus;
}

export type { EventBus, EventHandler } from './bus';
export { InMemoryEventBus } from './in-memory-bus';
export type { DeadLetter, InMemoryEventBusOptions } from './in-memory-bus';
export { buildEvent, buildEventFromContext } from './build-event';
