import type { AuditEntry, AuditFilter, NewAuditEntry, Ticket, TicketFilter } from '../types';

/**
 * Writes staged inside one unit commit together or not at all. A ticket
 * mutation and its audit entry always share a unit.
 */
export interface KitchenUnit {
  /** Read a ticket for mutation. Postgres takes a row lock here. */
  getTicketForUpdate(hubId: string, ticketId: string): Promise<Ticket | null>;
  insertTicket(ticket: Ticket): Promise<void>;
  /**
   * Persist `ticket`, whose `version` must be exactly one past the stored
   * version; otherwise TicketVersionConflictError.
   */
  updateTicket(ticket: Ticket): Promise<void>;
  appendAudit(entry: NewAuditEntry): Promise<void>;
}

export interface KitchenStore {
  runInUnit<T>(work: (unit: KitchenUnit) => Promise<T>): Promise<T>;
  findTicket(hubId: string, ticketId: string): Promise<Ticket | null>;
  findTicketsByOrder(hubId: string, orderId: string): Promise<Ticket[]>;
  listTickets(hubId: string, filter?: TicketFilter): Promise<Ticket[]>;
  /** Lazily streamed, ordered by sequence ascending. Never waits on writers. */
  queryAudit(hubId: string, filter?: AuditFilter): AsyncIterable<AuditEntry>;
}
