import { describe, it, expect } from 'vitest';
import { ValidationError } from '@kitchenflow/shared';
import { toAuditEntry, toAuditRow, toStorageFailure, toTicket, toTicketRow } from '../store/row-mappers';
import type { AuditRow, TicketRow } from '../store/row-mappers';
import { buildAuditConditions } from '../store/drizzle-store';
import { StorageFailureError } from '../errors';
import { T0, makeTicket } from './helpers';

function ticketRow(overrides: Partial<TicketRow> = {}): TicketRow {
  const { state, ...rest } = makeTicket();
  return { ...rest, status: state, ...overrides };
}

function auditRow(overrides: Partial<AuditRow> = {}): AuditRow {
  return {
    sequence: 7,
    hubId: 'hub-1',
    ticketId: 'ticket-1',
    orderId: 'order-1',
    orderLineId: 'line-1',
    stationId: 'grill',
    action: 'accepted',
    actorId: 'cook-1',
    actorType: 'user',
    fromState: 'received',
    toState: 'accepted',
    notes: null,
    metadata: null,
    occurredAt: T0,
    ...overrides,
  };
}

describe('ticket rows', () => {
  it('maps the status column onto state', () => {
    const ticket = toTicket(ticketRow({ status: 'in_progress', priority: 3 }));
    expect(ticket.state).toBe('in_progress');
    expect(ticket.priority).toBe(3);
    expect(ticket).not.toHaveProperty('status');
  });

  it('writes state back as status', () => {
    const row = toTicketRow(makeTicket({ state: 'bumped' }));
    expect(row.status).toBe('bumped');
    expect(row).not.toHaveProperty('state');
  });

  it('refuses a status the state machine does not know', () => {
    expect(() => toTicket(ticketRow({ status: 'plated' }))).toThrow(StorageFailureError);
  });
});

describe('audit rows', () => {
  it('decodes a stored entry', () => {
    expect(toAuditEntry(auditRow())).toMatchObject({
      sequence: 7,
      action: 'accepted',
      fromState: 'received',
      toState: 'accepted',
      actorType: 'user',
    });
  });

  it('keeps a null from-state for creation entries', () => {
    const entry = toAuditEntry(auditRow({ action: 'received', fromState: null, toState: 'received' }));
    expect(entry.fromState).toBeNull();
  });

  it('reads an unknown actor type as a user', () => {
    expect(toAuditEntry(auditRow({ actorType: 'robot' })).actorType).toBe('user');
  });

  it('refuses an unknown action', () => {
    expect(() => toAuditEntry(auditRow({ action: 'flambeed' }))).toThrow(StorageFailureError);
  });

  it('writes every field of a new entry', () => {
    const { sequence, ...entry } = toAuditEntry(auditRow());
    expect(sequence).toBe(7);
    expect(toAuditRow(entry)).toEqual(entry);
  });
});

describe('toStorageFailure', () => {
  it('passes domain errors through', () => {
    const err = new ValidationError('bad');
    expect(toStorageFailure('updateTicket', err)).toBe(err);
  });

  it('wraps driver errors', () => {
    const cause = new Error('ECONNREFUSED');
    const wrapped = toStorageFailure('updateTicket', cause);
    expect(wrapped).toBeInstanceOf(StorageFailureError);
    expect(wrapped.message).toBe('Storage unavailable during updateTicket: ECONNREFUSED');
    expect(wrapped.cause).toBe(cause);
  });
});

describe('buildAuditConditions', () => {
  it('adds one condition per filter on top of the hub', () => {
    expect(buildAuditConditions('hub-1', {})).toHaveLength(1);
    expect(
      buildAuditConditions('hub-1', { ticketId: 't', action: 'bumped', from: T0, to: T0 }),
    ).toHaveLength(5);
  });
});
