import type { RequestContext } from '@kitchenflow/core';
import type { AnnotatedTicket } from '../types';
import { TicketNotFoundError } from '../errors';
import { annotateTicket } from '../services/escalation';
import { getKds } from '../runtime';

export async function getTicket(ctx: RequestContext, ticketId: string): Promise<AnnotatedTicket> {
  const { store, settings } = getKds();
  const ticket = await store.findTicket(ctx.hubId, ticketId);
  if (!ticket) throw new TicketNotFoundError(ticketId);
  return annotateTicket(ticket, await settings.getSettings(ctx.hubId), new Date());
}
