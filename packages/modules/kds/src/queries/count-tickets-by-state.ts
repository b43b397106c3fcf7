import type { RequestContext } from '@kitchenflow/core';
import { getKds } from '../runtime';

export interface TicketCounts {
  received: number;
  accepted: number;
  inProgress: number;
  bumped: number;
  completed: number;
  /** received + accepted + inProgress */
  active: number;
}

export async function countTicketsByState(ctx: RequestContext): Promise<TicketCounts> {
  const tickets = await getKds().store.listTickets(ctx.hubId, {
    states: ['received', 'accepted', 'in_progress', 'bumped', 'completed'],
  });
  const counts: TicketCounts = { received: 0, accepted: 0, inProgress: 0, bumped: 0, completed: 0, active: 0 };
  for (const ticket of tickets) {
    switch (ticket.state) {
      case 'received':
        counts.received++;
        break;
      case 'accepted':
        counts.accepted++;
        break;
      case 'in_progress':
        counts.inProgress++;
        break;
      case 'bumped':
        counts.bumped++;
        break;
      case 'completed':
        counts.completed++;
        break;
    }
  }
  counts.active = counts.received + counts.accepted + counts.inProgress;
  return counts;
}
