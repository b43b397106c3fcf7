import type { ActorType } from '@kitchenflow/core';
import type { KdsUrgency } from '@kitchenflow/shared';

// ── Ticket lifecycle ────────────────────────────────────────────

export const TICKET_STATES = [
  'received',
  'accepted',
  'in_progress',
  'bumped',
  'completed',
  'served',
  'cancelled',
] as const;

export type TicketState = (typeof TICKET_STATES)[number];

export const TRIGGERS = ['accept', 'start', 'bump', 'complete', 'serve', 'cancel', 'recall'] as const;

export type Trigger = (typeof TRIGGERS)[number];

export const AUDIT_ACTIONS = [
  'received',
  'accepted',
  'started',
  'bumped',
  'completed',
  'served',
  'recalled',
  'cancelled',
  'priority_changed',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

/** Timestamp column stamped on entry to each state. */
export type TicketTimestampField =
  | 'createdAt'
  | 'acceptedAt'
  | 'startedAt'
  | 'bumpedAt'
  | 'completedAt'
  | 'servedAt'
  | 'cancelledAt';

// ── Entities ────────────────────────────────────────────────────

export interface Ticket {
  id: string;
  hubId: string;
  /** Weak references into the orders service; lookup only. */
  orderId: string;
  orderLineId: string;
  itemId: string;
  itemName: string;
  quantity: number;
  stationId: string;
  state: TicketState;
  priority: number;
  notes: string | null;
  createdAt: Date;
  acceptedAt: Date | null;
  startedAt: Date | null;
  bumpedAt: Date | null;
  completedAt: Date | null;
  servedAt: Date | null;
  cancelledAt: Date | null;
  lastTransitionAt: Date;
  version: number;
}

export interface AuditEntry {
  sequence: number;
  hubId: string;
  ticketId: string;
  orderId: string;
  orderLineId: string;
  stationId: string;
  action: AuditAction;
  actorId: string;
  actorType: ActorType;
  fromState: TicketState | null;
  toState: TicketState;
  notes: string | null;
  metadata: Record<string, unknown> | null;
  occurredAt: Date;
}

/** An audit entry before the store assigns its sequence number. */
export type NewAuditEntry = Omit<AuditEntry, 'sequence'>;

export interface Station {
  id: string;
  hubId: string;
  name: string;
  isActive: boolean;
}

// ── Read models ─────────────────────────────────────────────────

export interface AnnotatedTicket extends Ticket {
  elapsedSeconds: number;
  urgency: KdsUrgency;
}

export interface TicketFilter {
  states?: readonly TicketState[];
  stationId?: string;
}

export interface AuditFilter {
  ticketId?: string;
  orderId?: string;
  stationId?: string;
  actorId?: string;
  action?: AuditAction;
  /** Inclusive lower bound on `occurredAt`. */
  from?: Date;
  /** Exclusive upper bound on `occurredAt`. */
  to?: Date;
  limit?: number;
}
