import type { AuditEntry, AuditFilter, NewAuditEntry, Ticket, TicketFilter } from '../types';
import { TicketVersionConflictError } from '../errors';
import { matchesAuditFilter, matchesTicketFilter } from './filters';
import type { KitchenStore, KitchenUnit } from './types';

class StagedUnit implements KitchenUnit {
  readonly tickets = new Map<string, Ticket>();
  readonly inserted = new Set<string>();
  /** Committed version each updated ticket was read at. */
  readonly baseVersions = new Map<string, number>();
  readonly audit: NewAuditEntry[] = [];

  constructor(private readonly committed: ReadonlyMap<string, Ticket>) {}

  async getTicketForUpdate(hubId: string, ticketId: string): Promise<Ticket | null> {
    const ticket = this.tickets.get(ticketId) ?? this.committed.get(ticketId);
    if (!ticket || ticket.hubId !== hubId) return null;
    return { ...ticket };
  }

  async insertTicket(ticket: Ticket): Promise<void> {
    this.tickets.set(ticket.id, { ...ticket });
    this.inserted.add(ticket.id);
  }

  async updateTicket(ticket: Ticket): Promise<void> {
    const current = this.tickets.get(ticket.id) ?? this.committed.get(ticket.id);
    if (!current || current.version !== ticket.version - 1) {
      throw new TicketVersionConflictError(ticket.id);
    }
    if (!this.tickets.has(ticket.id)) this.baseVersions.set(ticket.id, current.version);
    this.tickets.set(ticket.id, { ...ticket });
  }

  async appendAudit(entry: NewAuditEntry): Promise<void> {
    this.audit.push({ ...entry });
  }
}

/**
 * Process-local store. Each unit stages its writes and commits them in one
 * synchronous step, so readers only ever see whole units.
 */
export class InMemoryKitchenStore implements KitchenStore {
  private readonly tickets = new Map<string, Ticket>();
  // Append-only; readers snapshot its length, so commits never disturb them.
  private readonly audit: AuditEntry[] = [];
  private sequence = 0;

  async runInUnit<T>(work: (unit: KitchenUnit) => Promise<T>): Promise<T> {
    const unit = new StagedUnit(this.tickets);
    const result = await work(unit);
    this.commit(unit);
    return result;
  }

  async findTicket(hubId: string, ticketId: string): Promise<Ticket | null> {
    const ticket = this.tickets.get(ticketId);
    return ticket && ticket.hubId === hubId ? { ...ticket } : null;
  }

  async findTicketsByOrder(hubId: string, orderId: string): Promise<Ticket[]> {
    const result: Ticket[] = [];
    for (const ticket of this.tickets.values()) {
      if (ticket.hubId === hubId && ticket.orderId === orderId) result.push({ ...ticket });
    }
    return result;
  }

  async listTickets(hubId: string, filter: TicketFilter = {}): Promise<Ticket[]> {
    const result: Ticket[] = [];
    for (const ticket of this.tickets.values()) {
      if (ticket.hubId === hubId && matchesTicketFilter(ticket, filter)) result.push({ ...ticket });
    }
    return result;
  }

  async *queryAudit(hubId: string, filter: AuditFilter = {}): AsyncIterable<AuditEntry> {
    const end = this.audit.length;
    let yielded = 0;
    for (let i = 0; i < end; i++) {
      if (filter.limit !== undefined && yielded >= filter.limit) return;
      const entry = this.audit[i];
      if (!entry || entry.hubId !== hubId || !matchesAuditFilter(entry, filter)) continue;
      yielded++;
      yield { ...entry };
    }
  }

  /** Number of committed audit entries across all hubs. */
  get auditSize(): number {
    return this.audit.length;
  }

  private commit(unit: StagedUnit): void {
    // Re-check versions against what committed while this unit was running.
    for (const [id, base] of unit.baseVersions) {
      if (this.tickets.get(id)?.version !== base) {
        throw new TicketVersionConflictError(id);
      }
    }
    for (const [id, staged] of unit.tickets) {
      this.tickets.set(id, staged);
    }
    for (const entry of unit.audit) {
      this.audit.push({ ...entry, sequence: ++this.sequence });
    }
  }
}
