import type { AuditEntry, AuditFilter, Ticket, TicketFilter } from '../types';

export function matchesTicketFilter(ticket: Ticket, filter: TicketFilter): boolean {
  if (filter.states && !filter.states.includes(ticket.state)) return false;
  if (filter.stationId && ticket.stationId !== filter.stationId) return false;
  return true;
}

export function matchesAuditFilter(entry: AuditEntry, filter: AuditFilter): boolean {
  if (filter.ticketId && entry.ticketId !== filter.ticketId) return false;
  if (filter.orderId && entry.orderId !== filter.orderId) return false;
  if (filter.stationId && entry.stationId !== filter.stationId) return false;
  if (filter.actorId && entry.actorId !== filter.actorId) return false;
  if (filter.action && entry.action !== filter.action) return false;
  if (filter.from && entry.occurredAt.getTime() < filter.from.getTime()) return false;
  if (filter.to && entry.occurredAt.getTime() >= filter.to.getTime()) return false;
  return true;
}
