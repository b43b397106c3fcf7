import { generateUlid, parseOrThrow } from '@kitchenflow/shared';
import {
  buildEventFromContext,
  createSystemContext,
  logger,
  serializeError,
  withKeyedLock,
} from '@kitchenflow/core';
import type { RequestContext } from '@kitchenflow/core';
import type { EventEnvelope } from '@kitchenflow/shared';
import type { Ticket } from '../types';
import { kitchenOrderSchema } from '../validation';
import type { KitchenOrderInput } from '../validation';
import type { RoutingError } from '../errors';
import { planRouting } from '../services/station-router';
import { buildAuditEntry } from '../services/audit';
import { KDS_EVENTS } from '../events/types';
import { publishCommitted } from '../events/publish';
import { getKds } from '../runtime';
import { transitionTicket } from './transition-ticket';

export interface RouteOrderResult {
  /** Tickets created by this call, in order-line order. */
  tickets: Ticket[];
  /** One per line that could not be routed. */
  errors: RoutingError[];
  /** Line ids that already had a ticket from an earlier intake. */
  duplicates: string[];
}

interface Intake {
  tickets: Ticket[];
  events: EventEnvelope[];
  duplicates: string[];
}

/**
 * Turn an order into one `received` ticket per routable line. Unroutable
 * lines are reported, not thrown. Re-sending an order only creates tickets
 * for lines not seen before.
 */
export async function routeOrder(ctx: RequestContext, input: KitchenOrderInput): Promise<RouteOrderResult> {
  const order = parseOrThrow(kitchenOrderSchema, input, 'Invalid kitchen order');
  const { store, stations, settings } = getKds();

  // Everything that can fail before the write is read up front, so a
  // failure here leaves no tickets behind and the order can be resent.
  const plan = await planRouting(ctx.hubId, order, stations);
  const hubSettings = await settings.getSettings(ctx.hubId);

  const intake = await withKeyedLock(`order:${ctx.hubId}:${order.orderId}`, async (): Promise<Intake> => {
    const existing = await store.findTicketsByOrder(ctx.hubId, order.orderId);
    const seen = new Set(existing.map((t) => t.orderLineId));
    const duplicates: string[] = [];
    const fresh = plan.routed.filter(({ line }) => {
      if (seen.has(line.lineId)) {
        duplicates.push(line.lineId);
        return false;
      }
      seen.add(line.lineId);
      return true;
    });
    if (fresh.length === 0) return { tickets: [], events: [], duplicates };

    const created = await store.runInUnit(async (unit) => {
      const now = new Date();
      const tickets: Ticket[] = [];
      const events: EventEnvelope[] = [];
      for (const { line, station } of fresh) {
        const ticket: Ticket = {
          id: generateUlid(),
          hubId: ctx.hubId,
          orderId: order.orderId,
          orderLineId: line.lineId,
          itemId: line.itemId,
          itemName: line.itemName,
          quantity: line.quantity,
          stationId: station.id,
          state: 'received',
          priority: order.priority,
          notes: line.notes ?? null,
          createdAt: now,
          acceptedAt: null,
          startedAt: null,
          bumpedAt: null,
          completedAt: null,
          servedAt: null,
          cancelledAt: null,
          lastTransitionAt: now,
          version: 1,
        };
        await unit.insertTicket(ticket);
        await unit.appendAudit(
          buildAuditEntry(ctx, ticket, { action: 'received', fromState: null, occurredAt: now }),
        );
        tickets.push(ticket);
        events.push(
          buildEventFromContext(ctx, KDS_EVENTS.TICKET_CREATED, {
            ticketId: ticket.id,
            orderId: ticket.orderId,
            orderLineId: ticket.orderLineId,
            orderNumber: order.orderNumber,
            stationId: ticket.stationId,
            itemName: ticket.itemName,
            quantity: ticket.quantity,
            priority: ticket.priority,
          }),
        );
      }
      return { tickets, events };
    });
    return { ...created, duplicates };
  });

  for (const error of plan.errors) {
    logger.warn('Order line not routed', {
      hubId: ctx.hubId,
      requestId: ctx.requestId,
      orderId: error.orderId,
      orderLineId: error.orderLineId,
      stationId: error.stationId,
      reason: error.reason,
    });
  }
  logger.info('Order routed', {
    hubId: ctx.hubId,
    requestId: ctx.requestId,
    orderId: order.orderId,
    created: intake.tickets.length,
    failed: plan.errors.length,
    duplicates: intake.duplicates.length,
  });

  await publishCommitted(intake.events);

  const tickets = hubSettings.autoAcceptEnabled
    ? await autoAccept(ctx, intake.tickets)
    : intake.tickets;

  return { tickets, errors: plan.errors, duplicates: intake.duplicates };
}

async function autoAccept(ctx: RequestContext, tickets: Ticket[]): Promise<Ticket[]> {
  const system = createSystemContext(ctx.hubId, ctx.requestId);
  const result: Ticket[] = [];
  for (const ticket of tickets) {
    try {
      result.push(await transitionTicket(system, ticket.id, () => 'accept'));
    } catch (err) {
      // The ticket was created and stays received; a cook can accept it.
      logger.error('Auto-accept failed', {
        hubId: ctx.hubId,
        ticketId: ticket.id,
        requestId: ctx.requestId,
        error: serializeError(err),
      });
      result.push(ticket);
    }
  }
  return result;
}
