import { parseOrThrow } from '@kitchenflow/shared';
import { buildEventFromContext, logger, withKeyedLock } from '@kitchenflow/core';
import type { RequestContext } from '@kitchenflow/core';
import type { Ticket } from '../types';
import { changePrioritySchema } from '../validation';
import type { ChangePriorityInput } from '../validation';
import { isTerminal } from '../state-machine';
import { buildAuditEntry } from '../services/audit';
import { KDS_EVENTS } from '../events/types';
import { publishCommitted } from '../events/publish';
import { IllegalTransitionError, TicketNotFoundError } from '../errors';
import { getKds } from '../runtime';
import { ticketLockKey } from './transition-ticket';

/**
 * Re-prioritize a ticket that is still in the kitchen. Leaves the state and
 * `lastTransitionAt` alone; re-setting the current priority is still
 * recorded.
 */
export async function changePriority(ctx: RequestContext, input: ChangePriorityInput): Promise<Ticket> {
  const { ticketId, priority, notes } = parseOrThrow(changePrioritySchema, input, 'Invalid priority change');
  const { store } = getKds();

  const result = await withKeyedLock(ticketLockKey(ticketId), () =>
    store.runInUnit(async (unit) => {
      const current = await unit.getTicketForUpdate(ctx.hubId, ticketId);
      if (!current) throw new TicketNotFoundError(ticketId);
      if (isTerminal(current.state)) {
        throw new IllegalTransitionError(ticketId, current.state, 'change priority of');
      }

      const now = new Date();
      const updated: Ticket = { ...current, priority, version: current.version + 1 };
      await unit.updateTicket(updated);
      await unit.appendAudit(
        buildAuditEntry(ctx, updated, {
          action: 'priority_changed',
          fromState: current.state,
          notes,
          metadata: { old: current.priority, new: priority },
          occurredAt: now,
        }),
      );

      const event = buildEventFromContext(ctx, KDS_EVENTS.TICKET_PRIORITY_CHANGED, {
        ticketId,
        orderId: current.orderId,
        stationId: current.stationId,
        oldPriority: current.priority,
        newPriority: priority,
      });
      return { ticket: updated, event };
    }),
  );

  logger.info('Ticket priority changed', {
    hubId: ctx.hubId,
    ticketId,
    actorId: ctx.actor.id,
    requestId: ctx.requestId,
    priority,
  });

  await publishCommitted([result.event]);
  return result.ticket;
}
