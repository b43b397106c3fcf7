import type { KdsUrgency, KitchenSettings } from '@kitchenflow/shared';
import type { AnnotatedTicket, Ticket } from '../types';
import { isTerminal } from '../state-machine';

/**
 * Whole seconds since the ticket entered its current state. Never negative,
 * so a clock that steps back reads as zero.
 */
export function elapsedSeconds(ticket: Ticket, now: Date): number {
  const ms = now.getTime() - ticket.lastTransitionAt.getTime();
  return ms <= 0 ? 0 : Math.floor(ms / 1000);
}

// A threshold of zero or less switches that level off.
export function classifyUrgency(ticket: Ticket, settings: KitchenSettings, now: Date): KdsUrgency {
  if (isTerminal(ticket.state)) return 'normal';
  const elapsed = elapsedSeconds(ticket, now);
  const { criticalThresholdSeconds: critical, warningThresholdSeconds: warning } = settings;
  if (critical > 0 && elapsed >= critical) return 'critical';
  if (warning > 0 && elapsed >= warning) return 'warning';
  return 'normal';
}

export function annotateTicket(ticket: Ticket, settings: KitchenSettings, now: Date): AnnotatedTicket {
  return {
    ...ticket,
    elapsedSeconds: elapsedSeconds(ticket, now),
    urgency: classifyUrgency(ticket, settings, now),
  };
}
