import type { AuditAction, Ticket, TicketState, TicketTimestampField, Trigger } from './types';
import { IllegalTransitionError } from './errors';

// ══════════════════════════════════════════════════════════════════
// Ticket State Machine
// ══════════════════════════════════════════════════════════════════
//
// RECEIVED    → ACCEPTED (accept), CANCELLED (cancel)
// ACCEPTED    → IN_PROGRESS (start), CANCELLED (cancel), RECEIVED (recall)
// IN_PROGRESS → BUMPED (bump), CANCELLED (cancel), ACCEPTED (recall)
// BUMPED      → COMPLETED (complete), CANCELLED (cancel), IN_PROGRESS (recall)
// COMPLETED   → SERVED (serve), BUMPED (recall)
// SERVED      → (terminal)
// CANCELLED   → (terminal)

export const TICKET_TRANSITIONS: Record<TicketState, Partial<Record<Trigger, TicketState>>> = {
  received: { accept: 'accepted', cancel: 'cancelled' },
  accepted: { start: 'in_progress', cancel: 'cancelled', recall: 'received' },
  in_progress: { bump: 'bumped', cancel: 'cancelled', recall: 'accepted' },
  bumped: { complete: 'completed', cancel: 'cancelled', recall: 'in_progress' },
  completed: { serve: 'served', recall: 'bumped' },
  served: {},
  cancelled: {},
};

export const TERMINAL_STATES: readonly TicketState[] = ['served', 'cancelled'];

/** States a ticket is in while it is still on the line, before it is bumped. */
export const ACTIVE_STATES: readonly TicketState[] = ['received', 'accepted', 'in_progress'];

export const TRIGGER_ACTIONS: Record<Trigger, AuditAction> = {
  accept: 'accepted',
  start: 'started',
  bump: 'bumped',
  complete: 'completed',
  serve: 'served',
  cancel: 'cancelled',
  recall: 'recalled',
};

export const STATE_TIMESTAMPS: Record<TicketState, TicketTimestampField> = {
  received: 'createdAt',
  accepted: 'acceptedAt',
  in_progress: 'startedAt',
  bumped: 'bumpedAt',
  completed: 'completedAt',
  served: 'servedAt',
  cancelled: 'cancelledAt',
};

/** Timestamp a recall clears, keyed by the state being left. */
export const RECALL_CLEARS: Partial<Record<TicketState, Exclude<TicketTimestampField, 'createdAt'>>> = {
  accepted: 'acceptedAt',
  in_progress: 'startedAt',
  bumped: 'bumpedAt',
  completed: 'completedAt',
};

/** The one forward trigger for each state, used by the quick-bump action. */
export const NEXT_FORWARD_TRIGGER: Partial<Record<TicketState, Trigger>> = {
  received: 'accept',
  accepted: 'start',
  in_progress: 'bump',
  bumped: 'complete',
  completed: 'serve',
};

export function isTerminal(state: TicketState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function resolveTransition(from: TicketState, trigger: Trigger): TicketState | null {
  return TICKET_TRANSITIONS[from][trigger] ?? null;
}

export function canTransition(from: TicketState, trigger: Trigger): boolean {
  return resolveTransition(from, trigger) !== null;
}

export function assertTransition(ticketId: string, from: TicketState, trigger: Trigger): TicketState {
  const to = resolveTransition(from, trigger);
  if (!to) {
    throw new IllegalTransitionError(ticketId, from, trigger);
  }
  return to;
}

export interface TransitionOutcome {
  ticket: Ticket;
  fromState: TicketState;
  toState: TicketState;
  action: AuditAction;
  at: Date;
}

/**
 * Compute the ticket that results from `trigger` at `now`. Pure; throws
 * IllegalTransitionError when the trigger is not valid for the current state.
 *
 * Forward moves stamp the target state's timestamp. A recall clears the
 * timestamp of the state being left so the next forward move stamps it
 * again; every earlier timestamp is kept. The stamp never goes backwards
 * past `lastTransitionAt`, so entered-state timestamps stay non-decreasing
 * even if the wall clock steps back.
 */
export function applyTrigger(ticket: Ticket, trigger: Trigger, now: Date): TransitionOutcome {
  const toState = assertTransition(ticket.id, ticket.state, trigger);
  const at = now.getTime() < ticket.lastTransitionAt.getTime() ? ticket.lastTransitionAt : now;

  const next: Ticket = {
    ...ticket,
    state: toState,
    lastTransitionAt: at,
    version: ticket.version + 1,
  };

  if (trigger === 'recall') {
    const cleared = RECALL_CLEARS[ticket.state];
    if (cleared) next[cleared] = null;
  } else {
    next[STATE_TIMESTAMPS[toState]] = at;
  }

  return { ticket: next, fromState: ticket.state, toState, action: TRIGGER_ACTIONS[trigger], at };
}
