import { parseOrThrow } from '@kitchenflow/shared';
import type { RequestContext } from '@kitchenflow/core';
import type { Ticket, Trigger } from '../types';
import { applyTransitionSchema } from '../validation';
import type { ApplyTransitionInput } from '../validation';
import { transitionTicket } from './transition-ticket';

export async function applyTransition(ctx: RequestContext, input: ApplyTransitionInput): Promise<Ticket> {
  const { ticketId, trigger, notes } = parseOrThrow(applyTransitionSchema, input, 'Invalid transition');
  return transitionTicket(ctx, ticketId, () => trigger, notes);
}

/** Positional form of `applyTransition` for display collaborators. */
export function transition(
  ctx: RequestContext,
  ticketId: string,
  trigger: Trigger,
  notes?: string,
): Promise<Ticket> {
  return applyTransition(ctx, { ticketId, trigger, notes });
}
