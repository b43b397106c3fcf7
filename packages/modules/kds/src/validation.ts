import { z } from 'zod';
import { AUDIT_ACTIONS, TRIGGERS } from './types';

// ── Intake ──────────────────────────────────────────────────────

export const orderLineSchema = z.object({
  lineId: z.string().min(1),
  itemId: z.string().min(1),
  itemName: z.string().min(1).max(200),
  quantity: z.number().int().min(1).default(1),
  /** Resolved by the menu/station mapping before the order reaches the kitchen. */
  stationId: z.string().min(1),
  notes: z.string().max(500).optional(),
});

export const kitchenOrderSchema = z.object({
  orderId: z.string().min(1),
  orderNumber: z.string().max(40).optional(),
  priority: z.number().int().min(0).default(0),
  lines: z.array(orderLineSchema).min(1),
});

export type OrderLineInput = z.input<typeof orderLineSchema>;
export type KitchenOrderInput = z.input<typeof kitchenOrderSchema>;
export type KitchenOrder = z.output<typeof kitchenOrderSchema>;

// ── Transitions ─────────────────────────────────────────────────

export const applyTransitionSchema = z.object({
  ticketId: z.string().min(1),
  trigger: z.enum(TRIGGERS),
  notes: z.string().max(500).optional(),
});

export type ApplyTransitionInput = z.input<typeof applyTransitionSchema>;

export const advanceTicketSchema = z.object({
  ticketId: z.string().min(1),
  notes: z.string().max(500).optional(),
});

export type AdvanceTicketInput = z.input<typeof advanceTicketSchema>;

export const changePrioritySchema = z.object({
  ticketId: z.string().min(1),
  priority: z.number().int().min(0),
  notes: z.string().max(500).optional(),
});

export type ChangePriorityInput = z.input<typeof changePrioritySchema>;

// ── Query filters ───────────────────────────────────────────────

export const listActiveSchema = z.object({
  stationId: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
});

export type ListActiveInput = z.input<typeof listActiveSchema>;

export const listReadySchema = z.object({
  stationId: z.string().min(1).optional(),
});

export type ListReadyInput = z.input<typeof listReadySchema>;

export const auditFilterSchema = z
  .object({
    ticketId: z.string().min(1).optional(),
    orderId: z.string().min(1).optional(),
    stationId: z.string().min(1).optional(),
    actorId: z.string().min(1).optional(),
    action: z.enum(AUDIT_ACTIONS).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    limit: z.coerce.number().int().min(1).max(1000).optional(),
  })
  .refine((f) => !f.from || !f.to || f.from.getTime() <= f.to.getTime(), {
    message: '`from` must not be after `to`',
    path: ['from'],
  });

export type AuditFilterInput = z.input<typeof auditFilterSchema>;
