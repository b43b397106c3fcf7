import { logger, serializeError } from '@kitchenflow/core';
import type { EventEnvelope } from '@kitchenflow/shared';
import { getKdsBus } from '../runtime';

/**
 * Publish events for a unit that has already committed. The ticket change
 * stands regardless of delivery, so failures are logged, not thrown.
 */
export async function publishCommitted(events: EventEnvelope[]): Promise<void> {
  if (events.length === 0) return;
  const bus = getKdsBus();
  for (const event of events) {
    try {
      await bus.publish(event);
    } catch (err) {
      logger.error('Failed to publish kitchen event', {
        hubId: event.hubId,
        eventType: event.eventType,
        eventId: event.eventId,
        error: serializeError(err),
      });
    }
  }
}
