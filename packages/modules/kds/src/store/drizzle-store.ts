import { and, asc, eq, gt, gte, inArray, lt } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { getDb, kdsAuditLog, kdsTickets } from '@kitchenflow/db';
import type { Database, Transaction } from '@kitchenflow/db';
import type { AuditEntry, AuditFilter, NewAuditEntry, Ticket, TicketFilter } from '../types';
import { TicketVersionConflictError } from '../errors';
import type { KitchenStore, KitchenUnit } from './types';
import { toAuditEntry, toAuditRow, toStorageFailure, toTicket, toTicketRow } from './row-mappers';

const AUDIT_PAGE_SIZE = 200;

class DrizzleUnit implements KitchenUnit {
  constructor(private readonly tx: Transaction) {}

  async getTicketForUpdate(hubId: string, ticketId: string): Promise<Ticket | null> {
    const [row] = await this.tx
      .select()
      .from(kdsTickets)
      .where(and(eq(kdsTickets.id, ticketId), eq(kdsTickets.hubId, hubId)))
      .for('update')
      .limit(1);
    return row ? toTicket(row) : null;
  }

  async insertTicket(ticket: Ticket): Promise<void> {
    await this.tx.insert(kdsTickets).values(toTicketRow(ticket));
  }

  async updateTicket(ticket: Ticket): Promise<void> {
    const { id, hubId, ...changes } = toTicketRow(ticket);
    const updated = await this.tx
      .update(kdsTickets)
      .set(changes)
      .where(and(
        eq(kdsTickets.id, ticket.id),
        eq(kdsTickets.hubId, ticket.hubId),
        eq(kdsTickets.version, ticket.version - 1),
      ))
      .returning({ id: kdsTickets.id });
    if (updated.length === 0) {
      throw new TicketVersionConflictError(ticket.id);
    }
  }

  async appendAudit(entry: NewAuditEntry): Promise<void> {
    await this.tx.insert(kdsAuditLog).values(toAuditRow(entry));
  }
}

/**
 * Postgres-backed store. One database transaction per unit; the ticket row
 * is locked with SELECT ... FOR UPDATE so writers in other processes are
 * serialized too.
 */
export class DrizzleKitchenStore implements KitchenStore {
  constructor(private readonly resolveDb: () => Database = getDb) {}

  async runInUnit<T>(work: (unit: KitchenUnit) => Promise<T>): Promise<T> {
    try {
      return await this.resolveDb().transaction((tx) => work(new DrizzleUnit(tx)));
    } catch (err) {
      throw toStorageFailure('kitchen unit', err);
    }
  }

  async findTicket(hubId: string, ticketId: string): Promise<Ticket | null> {
    try {
      const [row] = await this.resolveDb()
        .select()
        .from(kdsTickets)
        .where(and(eq(kdsTickets.id, ticketId), eq(kdsTickets.hubId, hubId)))
        .limit(1);
      return row ? toTicket(row) : null;
    } catch (err) {
      throw toStorageFailure('findTicket', err);
    }
  }

  async findTicketsByOrder(hubId: string, orderId: string): Promise<Ticket[]> {
    try {
      const rows = await this.resolveDb()
        .select()
        .from(kdsTickets)
        .where(and(eq(kdsTickets.hubId, hubId), eq(kdsTickets.orderId, orderId)));
      return rows.map(toTicket);
    } catch (err) {
      throw toStorageFailure('findTicketsByOrder', err);
    }
  }

  async listTickets(hubId: string, filter: TicketFilter = {}): Promise<Ticket[]> {
    const conditions: SQL[] = [eq(kdsTickets.hubId, hubId)];
    if (filter.states) {
      if (filter.states.length === 0) return [];
      conditions.push(inArray(kdsTickets.status, [...filter.states]));
    }
    if (filter.stationId) {
      conditions.push(eq(kdsTickets.stationId, filter.stationId));
    }
    try {
      const rows = await this.resolveDb()
        .select()
        .from(kdsTickets)
        .where(and(...conditions));
      return rows.map(toTicket);
    } catch (err) {
      throw toStorageFailure('listTickets', err);
    }
  }

  /**
   * Keyset-paginated by sequence, so each page is a short read that holds no
   * locks. Each page sees what was committed when it ran: sequence numbers
   * are taken at insert, not at commit, so an entry whose transaction
   * commits after a later page has been read is not yielded by this stream.
   * Callers that need a closed range re-query once writers have settled.
   */
  async *queryAudit(hubId: string, filter: AuditFilter = {}): AsyncIterable<AuditEntry> {
    const base = buildAuditConditions(hubId, filter);
    let cursor = 0;
    let remaining = filter.limit ?? Number.POSITIVE_INFINITY;

    while (remaining > 0) {
      const pageSize = Math.min(AUDIT_PAGE_SIZE, remaining);
      let rows: Array<typeof kdsAuditLog.$inferSelect>;
      try {
        rows = await this.resolveDb()
          .select()
          .from(kdsAuditLog)
          .where(and(...base, gt(kdsAuditLog.sequence, cursor)))
          .orderBy(asc(kdsAuditLog.sequence))
          .limit(pageSize);
      } catch (err) {
        throw toStorageFailure('queryAudit', err);
      }

      for (const row of rows) {
        yield toAuditEntry(row);
        cursor = row.sequence;
      }
      remaining -= rows.length;
      if (rows.length < pageSize) return;
    }
  }
}

export function buildAuditConditions(hubId: string, filter: AuditFilter): SQL[] {
  const conditions: SQL[] = [eq(kdsAuditLog.hubId, hubId)];
  if (filter.ticketId) conditions.push(eq(kdsAuditLog.ticketId, filter.ticketId));
  if (filter.orderId) conditions.push(eq(kdsAuditLog.orderId, filter.orderId));
  if (filter.stationId) conditions.push(eq(kdsAuditLog.stationId, filter.stationId));
  if (filter.actorId) conditions.push(eq(kdsAuditLog.actorId, filter.actorId));
  if (filter.action) conditions.push(eq(kdsAuditLog.action, filter.action));
  if (filter.from) conditions.push(gte(kdsAuditLog.occurredAt, filter.from));
  if (filter.to) conditions.push(lt(kdsAuditLog.occurredAt, filter.to));
  return conditions;
}
