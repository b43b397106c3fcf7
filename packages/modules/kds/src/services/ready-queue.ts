import type { Ticket } from '../types';

function time(value: Date | null): number {
  return value ? value.getTime() : Number.POSITIVE_INFINITY;
}

/** Highest priority first, then longest waiting, then id for a stable order. */
export function compareReady(a: Ticket, b: Ticket): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const waited = time(a.bumpedAt) - time(b.bumpedAt);
  if (waited !== 0) return waited;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function buildReadyQueue(tickets: readonly Ticket[]): Ticket[] {
  return tickets.filter((t) => t.state === 'bumped').sort(compareReady);
}

/** Order of the active board: priority desc, then oldest first. */
export function compareActive(a: Ticket, b: Ticket): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const age = a.createdAt.getTime() - b.createdAt.getTime();
  if (age !== 0) return age;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
