import { AppError, ConflictError, NotFoundError } from '@kitchenflow/shared';

/**
 * Kitchen error codes (used in API error responses):
 *
 * | Code               | HTTP | When                                         |
 * |--------------------|------|----------------------------------------------|
 * | ROUTING_FAILED     | 422  | Order line targets an unknown/inactive station |
 * | ILLEGAL_TRANSITION | 409  | Trigger not valid for the ticket's state     |
 * | NOT_FOUND          | 404  | Unknown ticket                               |
 * | STORAGE_FAILURE    | 503  | Persistence unavailable; nothing was applied |
 * | VALIDATION_ERROR   | 400  | Malformed input                              |
 */

export type RoutingFailureReason = 'unknown_station' | 'inactive_station';

export class RoutingError extends AppError {
  constructor(
    public readonly orderId: string,
    public readonly orderLineId: string,
    public readonly stationId: string,
    public readonly reason: RoutingFailureReason,
  ) {
    super(
      'ROUTING_FAILED',
      reason === 'inactive_station'
        ? `Order line ${orderLineId} targets inactive station ${stationId}`
        : `Order line ${orderLineId} targets unknown station ${stationId}`,
      422,
    );
    this.name = 'RoutingError';
  }
}

export class IllegalTransitionError extends ConflictError {
  constructor(
    public readonly ticketId: string,
    public readonly fromState: string,
    public readonly trigger: string,
  ) {
    super(`Cannot ${trigger} ticket ${ticketId} in state '${fromState}'`);
    this.code = 'ILLEGAL_TRANSITION';
    this.name = 'IllegalTransitionError';
  }
}

export class TicketNotFoundError extends NotFoundError {
  constructor(ticketId: string) {
    super('Ticket', ticketId);
    this.name = 'TicketNotFoundError';
  }
}

export class StorageFailureError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(
      'STORAGE_FAILURE',
      `Storage unavailable during ${operation}` +
        (cause instanceof Error ? `: ${cause.message}` : ''),
      503,
    );
    this.name = 'StorageFailureError';
    this.cause = cause;
  }
}

export class TicketVersionConflictError extends ConflictError {
  constructor(ticketId: string) {
    super(`Ticket ${ticketId} has been modified by another writer (optimistic lock)`);
    this.code = 'TICKET_VERSION_CONFLICT';
    this.name = 'TicketVersionConflictError';
  }
}
