import type { RequestContext } from '@kitchenflow/core';
import type { AuditAction, NewAuditEntry, Ticket, TicketState } from '../types';

export interface AuditEntryInput {
  action: AuditAction;
  fromState: TicketState | null;
  notes?: string | null;
  metadata?: Record<string, unknown> | null;
  occurredAt: Date;
}

/** Audit entry for `ticket` as it stands after the change being recorded. */
export function buildAuditEntry(
  ctx: RequestContext,
  ticket: Ticket,
  input: AuditEntryInput,
): NewAuditEntry {
  return {
    hubId: ticket.hubId,
    ticketId: ticket.id,
    orderId: ticket.orderId,
    orderLineId: ticket.orderLineId,
    stationId: ticket.stationId,
    action: input.action,
    actorId: ctx.actor.id,
    actorType: ctx.actor.type,
    fromState: input.fromState,
    toState: ticket.state,
    notes: input.notes ?? null,
    metadata: input.metadata ?? null,
    occurredAt: input.occurredAt,
  };
}
