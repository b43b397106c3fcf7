import { buildEventFromContext, logger, withKeyedLock } from '@kitchenflow/core';
import type { RequestContext } from '@kitchenflow/core';
import type { Ticket, Trigger } from '../types';
import { applyTrigger } from '../state-machine';
import { buildAuditEntry } from '../services/audit';
import { KDS_EVENTS } from '../events/types';
import { publishCommitted } from '../events/publish';
import { TicketNotFoundError } from '../errors';
import { getKds } from '../runtime';

export function ticketLockKey(ticketId: string): string {
  return `ticket:${ticketId}`;
}

/**
 * Shared body of every state-changing ticket command: lock the ticket, read
 * it inside a unit, apply the trigger chosen for its current state, and
 * write the ticket with its audit entry in the same unit. Events go out
 * after the unit commits.
 */
export async function transitionTicket(
  ctx: RequestContext,
  ticketId: string,
  pickTrigger: (ticket: Ticket) => Trigger,
  notes?: string,
): Promise<Ticket> {
  const { store } = getKds();

  const result = await withKeyedLock(ticketLockKey(ticketId), () =>
    store.runInUnit(async (unit) => {
      const current = await unit.getTicketForUpdate(ctx.hubId, ticketId);
      if (!current) throw new TicketNotFoundError(ticketId);

      const trigger = pickTrigger(current);
      const outcome = applyTrigger(current, trigger, new Date());

      await unit.updateTicket(outcome.ticket);
      await unit.appendAudit(
        buildAuditEntry(ctx, outcome.ticket, {
          action: outcome.action,
          fromState: outcome.fromState,
          notes,
          occurredAt: outcome.at,
        }),
      );

      const event = buildEventFromContext(ctx, KDS_EVENTS.TICKET_STATUS_CHANGED, {
        ticketId,
        orderId: current.orderId,
        stationId: current.stationId,
        trigger,
        fromState: outcome.fromState,
        toState: outcome.toState,
        occurredAt: outcome.at.toISOString(),
      });

      return { ticket: outcome.ticket, trigger, event };
    }),
  );

  logger.info('Ticket transitioned', {
    hubId: ctx.hubId,
    ticketId,
    actorId: ctx.actor.id,
    requestId: ctx.requestId,
    trigger: result.trigger,
    toState: result.ticket.state,
  });

  await publishCommitted([result.event]);
  return result.ticket;
}
