import { HttpStatus } from '@nestjs/common';

/**
 * Base class for errors raised by the order lifecycle core. Carries a stable
 * machine-readable code and the HTTP status the outer layer maps it to.
 */
export abstract class OrderDomainError extends Error {
  abstract readonly code: string;
  abstract readonly status: HttpStatus;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed creation request. Raised before any write. */
export class ValidationError extends OrderDomainError {
  readonly code = 'ORDER_VALIDATION_FAILED';
  readonly status = HttpStatus.BAD_REQUEST;
}

export class InvalidTransitionError extends OrderDomainError {
  readonly code = 'ORDER_INVALID_TRANSITION';
  readonly status = HttpStatus.CONFLICT;

  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Cannot transition order from ${from} to ${to}`, { from, to });
  }
}

export class NotFoundError extends OrderDomainError {
  readonly status = HttpStatus.NOT_FOUND;

  constructor(
    readonly code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message, details);
  }

  static order(orderId: string): NotFoundError {
    return new NotFoundError(
      'ORDER_NOT_FOUND',
      `Order with ID ${orderId} not found`,
      { orderId },
    );
  }

  static outboxEvent(eventId: string): NotFoundError {
    return new NotFoundError(
      'OUTBOX_EVENT_NOT_FOUND',
      `Outbox event with ID ${eventId} not found`,
      { eventId },
    );
  }
}

/** Optimistic version check lost against a concurrent writer. */
export class ConflictError extends OrderDomainError {
  readonly code = 'ORDER_VERSION_CONFLICT';
  readonly status = HttpStatus.CONFLICT;

  constructor(orderId: string, expectedVersion: number) {
    super('Order version is stale', { orderId, expectedVersion });
  }
}

/**
 * Broker rejected or timed out on a single outbox event. Contained inside the
 * outbox publisher and never surfaced to order callers.
 */
export class PublishFailure extends OrderDomainError {
  readonly code = 'OUTBOX_PUBLISH_FAILED';
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(
    readonly eventId: string,
    cause: unknown,
  ) {
    super(`Failed to publish outbox event ${eventId}: ${describeError(cause)}`, {
      eventId,
    });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
