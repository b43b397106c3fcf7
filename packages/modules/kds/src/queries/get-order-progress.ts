import type { RequestContext } from '@kitchenflow/core';
import type { Ticket, TicketState } from '../types';
import { getKds } from '../runtime';

export interface OrderProgress {
  orderId: string;
  /** Ordered by creation, then id. */
  tickets: Ticket[];
  counts: Record<TicketState, number>;
  /**
   * True once every ticket that was not cancelled has left the line
   * (bumped, completed or served). An order with no such ticket is never ready.
   */
  ready: boolean;
}

const PAST_THE_LINE: ReadonlySet<TicketState> = new Set(['bumped', 'completed', 'served']);

export async function getOrderProgress(ctx: RequestContext, orderId: string): Promise<OrderProgress> {
  const found = await getKds().store.findTicketsByOrder(ctx.hubId, orderId);
  const tickets = [...found].sort(
    (a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id),
  );

  const counts: Record<TicketState, number> = {
    received: 0,
    accepted: 0,
    in_progress: 0,
    bumped: 0,
    completed: 0,
    served: 0,
    cancelled: 0,
  };
  for (const ticket of tickets) counts[ticket.state]++;

  const live = tickets.filter((t) => t.state !== 'cancelled');
  return {
    orderId,
    tickets,
    counts,
    ready: live.length > 0 && live.every((t) => PAST_THE_LINE.has(t.state)),
  };
}
