import { parseOrThrow } from '@kitchenflow/shared';
import type { RequestContext } from '@kitchenflow/core';
import type { AnnotatedTicket } from '../types';
import { listReadySchema } from '../validation';
import type { ListReadyInput } from '../validation';
import { annotateTicket } from '../services/escalation';
import { buildReadyQueue } from '../services/ready-queue';
import { getKds } from '../runtime';

/** Bumped tickets waiting for pickup, in the order they should leave the pass. */
export async function listReady(ctx: RequestContext, input: ListReadyInput = {}): Promise<AnnotatedTicket[]> {
  const { stationId } = parseOrThrow(listReadySchema, input, 'Invalid ready queue query');
  const { store, settings } = getKds();
  const [tickets, hubSettings] = await Promise.all([
    store.listTickets(ctx.hubId, { states: ['bumped'], stationId }),
    settings.getSettings(ctx.hubId),
  ]);
  const now = new Date();
  return buildReadyQueue(tickets).map((t) => annotateTicket(t, hubSettings, now));
}
