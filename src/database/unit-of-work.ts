import type { Order } from '../modules/orders/order.entity';
import type {
  OutboxEvent,
  OutboxStatus,
} from '../modules/outbox/outbox-event.entity';

export interface OrderPage {
  items: Order[];
  nextCursor?: string;
}

export interface OrderStore {
  findById(id: string): Promise<Order | null>;
  findByIdempotencyKey(key: string): Promise<Order | null>;
  /** Newest first, keyset-paginated on (createdAt, id). */
  findByUser(
    userId: string,
    options: { limit: number; cursor?: string },
  ): Promise<OrderPage>;
  /** Throws UniqueConstraintViolation on a duplicate number or idempotency key. */
  insert(order: Order): Promise<void>;
  /** Throws ConflictError when the stored version is not `expectedVersion`. */
  update(order: Order, expectedVersion: number): Promise<void>;
}

export type FailureOutcome =
  | { status: 'PENDING' | 'FAILED'; retryCount: number }
  | { status: 'SKIPPED' };

export interface OutboxStore {
  append(event: OutboxEvent): Promise<void>;
  findById(id: string): Promise<OutboxEvent | null>;
  /** PENDING events created at or before `olderThan`, oldest first. */
  fetchPending(limit: number, olderThan?: Date): Promise<OutboxEvent[]>;
  /** No-op unless the event is still PENDING. Returns whether it changed. */
  markProcessed(id: string, at?: Date): Promise<boolean>;
  /**
   * Counts one failed attempt. The event becomes FAILED once its retry count
   * reaches `maxRetries`; otherwise it stays PENDING for the next cycle.
   */
  recordFailure(
    id: string,
    error: string,
    maxRetries: number,
  ): Promise<FailureOutcome>;
  markFailed(id: string, error: string): Promise<boolean>;
  findFailed(limit: number): Promise<OutboxEvent[]>;
  /** FAILED back to PENDING with a fresh retry budget. */
  requeue(id: string): Promise<boolean>;
  countByStatus(): Promise<Record<OutboxStatus, number>>;
}

export interface TransactionStores {
  orders: OrderStore;
  outbox: OutboxStore;
}

/**
 * One atomic scope over the order and outbox tables. `run` commits when the
 * work resolves and rolls everything back when it rejects.
 */
export abstract class UnitOfWork {
  abstract run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T>;

  /** Stores bound to autocommit, for readers and the outbox publisher. */
  abstract readonly orders: OrderStore;
  abstract readonly outbox: OutboxStore;

  abstract ping(): Promise<void>;
}

export class UniqueConstraintViolation extends Error {
  constructor(readonly constraint: string) {
    super(`Unique constraint ${constraint} violated`);
    this.name = 'UniqueConstraintViolation';
    Object.setPrototypeOf(this, UniqueConstraintViolation.prototype);
  }
}

export const IDEMPOTENCY_KEY_CONSTRAINT = 'uq_orders_idempotency_key';
export const ORDER_NUMBER_CONSTRAINT = 'uq_orders_order_number';
