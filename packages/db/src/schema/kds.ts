import {
  pgTable,
  text,
  boolean,
  timestamp,
  integer,
  bigserial,
  index,
  uniqueIndex,
  jsonb,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@kitchenflow/shared';

// ═══════════════════════════════════════════════════════════════════
// Kitchen Display: stations, settings, tickets and the audit trail
// ═══════════════════════════════════════════════════════════════════

// ── Stations (maintained by the menu/station service; read here) ──
export const kdsStations = pgTable(
  'kds_stations',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    hubId: text('hub_id').notNull(),
    name: text('name').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    sortOrder: integer('sort_order').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_kds_stations_hub').on(table.hubId, table.isActive)],
);

// ── Per-hub settings (written by the settings service only) ───────
export const kdsSettings = pgTable('kds_settings', {
  hubId: text('hub_id').primaryKey(),
  settings: jsonb('settings').$type<Record<string, unknown>>().notNull().default({}),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Tickets ────────────────────────────────────────────────────────
export const kdsTickets = pgTable(
  'kds_tickets',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    hubId: text('hub_id').notNull(),
    orderId: text('order_id').notNull(), // weak ref to orders service
    orderLineId: text('order_line_id').notNull(), // weak ref to orders service
    itemId: text('item_id').notNull(),
    itemName: text('item_name').notNull(), // denormalized
    quantity: integer('quantity').notNull().default(1),
    stationId: text('station_id').notNull(),
    status: text('status').notNull().default('received'),
    priority: integer('priority').notNull().default(0),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    acceptedAt: timestamp('accepted_at', { withTimezone: true }),
    startedAt: timestamp('started_at', { withTimezone: true }),
    bumpedAt: timestamp('bumped_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    servedAt: timestamp('served_at', { withTimezone: true }),
    cancelledAt: timestamp('cancelled_at', { withTimezone: true }),
    lastTransitionAt: timestamp('last_transition_at', { withTimezone: true }).notNull().defaultNow(),
    version: integer('version').notNull().default(1),
  },
  (table) => [
    index('idx_kds_tickets_hub_station_status').on(table.hubId, table.stationId, table.status),
    index('idx_kds_tickets_hub_status').on(table.hubId, table.status),
    // One ticket per order line; resent orders cannot duplicate work.
    uniqueIndex('uq_kds_tickets_order_line').on(table.hubId, table.orderId, table.orderLineId),
  ],
);

// ── Audit trail (append-only) ──────────────────────────────────────
export const kdsAuditLog = pgTable(
  'kds_audit_log',
  {
    sequence: bigserial('sequence', { mode: 'number' }).primaryKey(),
    hubId: text('hub_id').notNull(),
    ticketId: text('ticket_id').notNull(),
    orderId: text('order_id').notNull(),
    orderLineId: text('order_line_id').notNull(),
    stationId: text('station_id').notNull(),
    action: text('action').notNull(),
    actorId: text('actor_id').notNull(),
    actorType: text('actor_type').notNull().default('user'),
    fromState: text('from_state'),
    toState: text('to_state').notNull(),
    notes: text('notes'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_kds_audit_ticket').on(table.ticketId, table.sequence),
    index('idx_kds_audit_hub_time').on(table.hubId, table.occurredAt),
  ],
);
