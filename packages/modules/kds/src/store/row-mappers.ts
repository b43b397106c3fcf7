import type { kdsAuditLog, kdsTickets } from '@kitchenflow/db';
import type { ActorType } from '@kitchenflow/core';
import { AppError } from '@kitchenflow/shared';
import { AUDIT_ACTIONS, TICKET_STATES } from '../types';
import type { AuditAction, AuditEntry, NewAuditEntry, Ticket, TicketState } from '../types';
import { StorageFailureError } from '../errors';

export type TicketRow = typeof kdsTickets.$inferSelect;
export type TicketInsertRow = typeof kdsTickets.$inferInsert;
export type AuditRow = typeof kdsAuditLog.$inferSelect;
export type AuditInsertRow = typeof kdsAuditLog.$inferInsert;

const ACTOR_TYPES: readonly ActorType[] = ['user', 'system'];

function parseState(value: string): TicketState {
  const state = TICKET_STATES.find((s) => s === value);
  if (!state) throw new StorageFailureError(`decoding ticket state '${value}'`);
  return state;
}

function parseAction(value: string): AuditAction {
  const action = AUDIT_ACTIONS.find((a) => a === value);
  if (!action) throw new StorageFailureError(`decoding audit action '${value}'`);
  return action;
}

function parseActorType(value: string): ActorType {
  return ACTOR_TYPES.find((t) => t === value) ?? 'user';
}

export function toTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    hubId: row.hubId,
    orderId: row.orderId,
    orderLineId: row.orderLineId,
    itemId: row.itemId,
    itemName: row.itemName,
    quantity: row.quantity,
    stationId: row.stationId,
    state: parseState(row.status),
    priority: row.priority,
    notes: row.notes,
    createdAt: row.createdAt,
    acceptedAt: row.acceptedAt,
    startedAt: row.startedAt,
    bumpedAt: row.bumpedAt,
    completedAt: row.completedAt,
    servedAt: row.servedAt,
    cancelledAt: row.cancelledAt,
    lastTransitionAt: row.lastTransitionAt,
    version: row.version,
  };
}

export function toTicketRow(ticket: Ticket): TicketInsertRow {
  const { state, ...rest } = ticket;
  return { ...rest, status: state };
}

export function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    sequence: row.sequence,
    hubId: row.hubId,
    ticketId: row.ticketId,
    orderId: row.orderId,
    orderLineId: row.orderLineId,
    stationId: row.stationId,
    action: parseAction(row.action),
    actorId: row.actorId,
    actorType: parseActorType(row.actorType),
    fromState: row.fromState === null ? null : parseState(row.fromState),
    toState: parseState(row.toState),
    notes: row.notes,
    metadata: row.metadata,
    occurredAt: row.occurredAt,
  };
}

export function toAuditRow(entry: NewAuditEntry): AuditInsertRow {
  return { ...entry };
}

/**
 * Domain errors raised inside a unit pass through untouched; anything the
 * driver throws becomes a StorageFailureError.
 */
export function toStorageFailure(operation: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new StorageFailureError(operation, err);
}
