import { InvalidTransitionError } from '../../common/errors/domain-errors';

export const ORDER_STATUSES = [
  'CREATED',
  'PAYMENT_PENDING',
  'PAYMENT_CONFIRMED',
  'PROCESSING',
  'COMPLETED',
  'CANCELLED',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

const TRANSITIONS: Readonly<Record<OrderStatus, ReadonlySet<OrderStatus>>> = {
  CREATED: new Set<OrderStatus>(['PAYMENT_PENDING', 'CANCELLED']),
  PAYMENT_PENDING: new Set<OrderStatus>(['PAYMENT_CONFIRMED', 'CANCELLED']),
  PAYMENT_CONFIRMED: new Set<OrderStatus>(['PROCESSING', 'CANCELLED']),
  PROCESSING: new Set<OrderStatus>(['COMPLETED', 'CANCELLED']),
  COMPLETED: new Set<OrderStatus>(),
  CANCELLED: new Set<OrderStatus>(),
};

/** The lifecycle fields a transition reads and writes. */
export interface OrderLifecycle {
  status: OrderStatus;
  updatedAt: Date;
  completedAt: Date | null;
  cancelledAt: Date | null;
  cancellationReason: string | null;
}

export interface TransitionOptions {
  at?: Date;
  reason?: string;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].has(to);
}

export function allowedTransitions(from: OrderStatus): OrderStatus[] {
  return ORDER_STATUSES.filter((status) => TRANSITIONS[from].has(status));
}

export function isTerminal(status: OrderStatus): boolean {
  return TRANSITIONS[status].size === 0;
}

/**
 * Returns a copy of `order` moved to `to`. The only sanctioned way to change
 * an order's status; throws InvalidTransitionError for any edge outside the
 * table and leaves the input untouched.
 */
export function transition<T extends OrderLifecycle>(
  order: T,
  to: OrderStatus,
  options: TransitionOptions = {},
): T {
  if (!canTransition(order.status, to)) {
    throw new InvalidTransitionError(order.status, to);
  }

  const at = options.at ?? new Date();
  // strictly increasing per order, so per-order events sort by creation time
  const updatedAt =
    at.getTime() > order.updatedAt.getTime()
      ? at
      : new Date(order.updatedAt.getTime() + 1);

  const lifecycle: OrderLifecycle = {
    status: to,
    updatedAt,
    completedAt: to === 'COMPLETED' ? at : order.completedAt,
    cancelledAt: to === 'CANCELLED' ? at : order.cancelledAt,
    cancellationReason:
      to === 'CANCELLED' ? options.reason ?? '' : order.cancellationReason,
  };
  return { ...order, ...lifecycle };
}
