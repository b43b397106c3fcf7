import { parseOrThrow } from '@kitchenflow/shared';
import type { RequestContext } from '@kitchenflow/core';
import type { AnnotatedTicket } from '../types';
import { listActiveSchema } from '../validation';
import type { ListActiveInput } from '../validation';
import { ACTIVE_STATES } from '../state-machine';
import { annotateTicket } from '../services/escalation';
import { compareActive } from '../services/ready-queue';
import { getKds } from '../runtime';

export interface ActiveTicketPage {
  items: AnnotatedTicket[];
  page: number;
  pageSize: number;
  total: number;
}

/** Tickets still being worked, one display page at a time. */
export async function listActive(ctx: RequestContext, input: ListActiveInput = {}): Promise<ActiveTicketPage> {
  const { stationId, page } = parseOrThrow(listActiveSchema, input, 'Invalid active ticket query');
  const { store, settings } = getKds();

  const [tickets, hubSettings] = await Promise.all([
    store.listTickets(ctx.hubId, { states: ACTIVE_STATES, stationId }),
    settings.getSettings(ctx.hubId),
  ]);

  const pageSize = hubSettings.itemsPerPage;
  const now = new Date();
  const items = tickets
    .sort(compareActive)
    .slice((page - 1) * pageSize, page * pageSize)
    .map((t) => annotateTicket(t, hubSettings, now));

  return { items, page, pageSize, total: tickets.length };
}
