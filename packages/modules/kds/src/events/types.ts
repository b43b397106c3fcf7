// ── KDS Event Constants ─────────────────────────────────────────
export const KDS_EVENTS = {
  TICKET_CREATED: 'kds.ticket.created.v1',
  TICKET_STATUS_CHANGED: 'kds.ticket.status_changed.v1',
  TICKET_PRIORITY_CHANGED: 'kds.ticket.priority_changed.v1',
} as const;

export type KdsEventType = (typeof KDS_EVENTS)[keyof typeof KDS_EVENTS];
