export const MODULE_KEY = 'kds' as const;
export const MODULE_NAME = 'Kitchen Display System';
export const MODULE_VERSION = '1.0.0';

// ── Types ───────────────────────────────────────────────────────
export { TICKET_STATES, TRIGGERS, AUDIT_ACTIONS } from './types';
export type {
  TicketState,
  Trigger,
  AuditAction,
  TicketTimestampField,
  Ticket,
  AuditEntry,
  NewAuditEntry,
  Station,
  AnnotatedTicket,
  TicketFilter,
  AuditFilter,
} from './types';

// ── Errors ──────────────────────────────────────────────────────
export {
  RoutingError,
  IllegalTransitionError,
  TicketNotFoundError,
  StorageFailureError,
  TicketVersionConflictError,
} from './errors';
export type { RoutingFailureReason } from './errors';

// ── State machine ───────────────────────────────────────────────
export {
  TICKET_TRANSITIONS,
  TERMINAL_STATES,
  ACTIVE_STATES,
  NEXT_FORWARD_TRIGGER,
  isTerminal,
  resolveTransition,
  canTransition,
  assertTransition,
  applyTrigger,
} from './state-machine';
export type { TransitionOutcome } from './state-machine';

// ── Validation ──────────────────────────────────────────────────
export {
  orderLineSchema,
  kitchenOrderSchema,
  applyTransitionSchema,
  advanceTicketSchema,
  changePrioritySchema,
  listActiveSchema,
  listReadySchema,
  auditFilterSchema,
} from './validation';
export type {
  OrderLineInput,
  KitchenOrderInput,
  KitchenOrder,
  ApplyTransitionInput,
  AdvanceTicketInput,
  ChangePriorityInput,
  ListActiveInput,
  ListReadyInput,
  AuditFilterInput,
} from './validation';

// ── Runtime & collaborators ─────────────────────────────────────
export { configureKds, getKds, resetKds } from './runtime';
export type { KdsRuntime } from './runtime';
export { StaticSettingsProvider } from './settings';
export type { SettingsProvider } from './settings';
export { InMemoryStationDirectory } from './stations';
export type { StationDirectory } from './stations';
export { InMemoryKitchenStore } from './store/in-memory-store';
export { DrizzleKitchenStore } from './store/drizzle-store';
export { DrizzleSettingsProvider, DrizzleStationDirectory } from './store/drizzle-lookups';
export type { KitchenStore, KitchenUnit } from './store/types';

// ── Events ──────────────────────────────────────────────────────
export { KDS_EVENTS } from './events/types';
export type { KdsEventType } from './events/types';

// ── Services ────────────────────────────────────────────────────
export { elapsedSeconds, classifyUrgency, annotateTicket } from './services/escalation';
export { compareReady, buildReadyQueue } from './services/ready-queue';
export { planRouting } from './services/station-router';
export type { RoutingPlan, RoutedLine } from './services/station-router';
export { AutoBumpScheduler } from './services/auto-bump-scheduler';
export type { AutoBumpTickResult } from './services/auto-bump-scheduler';

// ── Commands ────────────────────────────────────────────────────
export { routeOrder } from './commands/route-order';
export type { RouteOrderResult } from './commands/route-order';
export { applyTransition, transition } from './commands/apply-transition';
export { advanceTicket } from './commands/advance-ticket';
export { changePriority } from './commands/change-priority';

// ── Queries ─────────────────────────────────────────────────────
export { getTicket } from './queries/get-ticket';
export { listActive } from './queries/list-active';
export type { ActiveTicketPage } from './queries/list-active';
export { listReady } from './queries/list-ready';
export { listHistory, collectHistory, DEFAULT_HISTORY_LIMIT } from './queries/list-history';
export { countTicketsByState } from './queries/count-tickets-by-state';
export type { TicketCounts } from './queries/count-tickets-by-state';
export { getOrderProgress } from './queries/get-order-progress';
export type { OrderProgress } from './queries/get-order-progress';
