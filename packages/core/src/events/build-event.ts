import { generateUlid } from '@kitchenflow/shared';
import type { EventEnvelope } from '@kitchenflow/shared';
import type { RequestContext } from '../auth/context';

interface BuildEventInput {
  eventType: string;
  hubId: string;
  actorId?: string;
  correlationId?: string;
  data: Record<string, unknown>;
  idempotencyKey?: string;
}

export function buildEvent(input: BuildEventInput): EventEnvelope {
  const eventId = generateUlid();
  return {
    eventId,
    eventType: input.eventType,
    occurredAt: new Date().toISOString(),
    hubId: input.hubId,
    actorId: input.actorId,
    correlationId: input.correlationId,
    idempotencyKey: input.idempotencyKey ?? `${input.hubId}:${input.eventType}:${eventId}`,
    data: input.data,
  };
}

export function buildEventFromContext(
  ctx: RequestContext,
  eventType: string,
  data: Record<string, unknown>,
  idempotencyKey?: string,
): EventEnvelope {
  return buildEvent({
    eventType,
    hubId: ctx.hubId,
    actorId: ctx.actor.id,
    correlationId: ctx.requestId,
    data,
    idempotencyKey,
  });
}
