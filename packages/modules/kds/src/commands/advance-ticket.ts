import { parseOrThrow } from '@kitchenflow/shared';
import type { RequestContext } from '@kitchenflow/core';
import type { Ticket } from '../types';
import { advanceTicketSchema } from '../validation';
import type { AdvanceTicketInput } from '../validation';
import { NEXT_FORWARD_TRIGGER } from '../state-machine';
import { IllegalTransitionError } from '../errors';
import { transitionTicket } from './transition-ticket';

/**
 * Quick bump: move the ticket one step forward, whatever state it is in.
 * The trigger is chosen under the ticket lock, so two quick bumps in a row
 * move the ticket two steps.
 */
export async function advanceTicket(ctx: RequestContext, input: AdvanceTicketInput): Promise<Ticket> {
  const { ticketId, notes } = parseOrThrow(advanceTicketSchema, input, 'Invalid advance');
  return transitionTicket(
    ctx,
    ticketId,
    (ticket) => {
      const trigger = NEXT_FORWARD_TRIGGER[ticket.state];
      if (!trigger) throw new IllegalTransitionError(ticket.id, ticket.state, 'advance');
      return trigger;
    },
    notes,
  );
}
