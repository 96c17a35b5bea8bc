import { ConflictError } from '../../src/common/errors/domain-errors';
import {
  decodeOrderCursor,
  encodeOrderCursor,
} from '../../src/database/order-cursor';
import {
  FailureOutcome,
  IDEMPOTENCY_KEY_CONSTRAINT,
  ORDER_NUMBER_CONSTRAINT,
  OrderPage,
  OrderStore,
  OutboxStore,
  TransactionStores,
  UniqueConstraintViolation,
  UnitOfWork,
} from '../../src/database/unit-of-work';
import type { Order } from '../../src/modules/orders/order.entity';
import type {
  OutboxEvent,
  OutboxStatus,
} from '../../src/modules/outbox/outbox-event.entity';

const clone = <T>(value: T): T => structuredClone(value);

/**
 * In-process stand-in for the Postgres tables. Each `run` works on staged
 * writes over the committed state and applies them in one synchronous step,
 * re-checking unique keys and order versions at commit like the database
 * would for a concurrent transaction.
 */
export class InMemoryDatabase extends UnitOfWork {
  readonly committedOrders = new Map<string, Order>();
  readonly committedEvents = new Map<string, OutboxEvent>();
  commits = 0;
  rollbacks = 0;

  readonly orders: OrderStore = {
    findById: (id) => this.run((s) => s.orders.findById(id)),
    findByIdempotencyKey: (key) =>
      this.run((s) => s.orders.findByIdempotencyKey(key)),
    findByUser: (userId, options) =>
      this.run((s) => s.orders.findByUser(userId, options)),
    insert: (order) => this.run((s) => s.orders.insert(order)),
    update: (order, expectedVersion) =>
      this.run((s) => s.orders.update(order, expectedVersion)),
  };

  readonly outbox: OutboxStore = {
    append: (event) => this.run((s) => s.outbox.append(event)),
    findById: (id) => this.run((s) => s.outbox.findById(id)),
    fetchPending: (limit, olderThan) =>
      this.run((s) => s.outbox.fetchPending(limit, olderThan)),
    markProcessed: (id, at) => this.run((s) => s.outbox.markProcessed(id, at)),
    recordFailure: (id, error, maxRetries) =>
      this.run((s) => s.outbox.recordFailure(id, error, maxRetries)),
    markFailed: (id, error) => this.run((s) => s.outbox.markFailed(id, error)),
    findFailed: (limit) => this.run((s) => s.outbox.findFailed(limit)),
    requeue: (id) => this.run((s) => s.outbox.requeue(id)),
    countByStatus: () => this.run((s) => s.outbox.countByStatus()),
  };

  async run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T> {
    const tx = new InMemoryTransaction(this);
    let result: T;
    try {
      result = await work(tx.stores);
    } catch (error) {
      this.rollbacks += 1;
      throw error;
    }
    try {
      tx.commit();
    } catch (error) {
      this.rollbacks += 1;
      throw error;
    }
    this.commits += 1;
    return result;
  }

  async ping(): Promise<void> {}

  allEvents(): OutboxEvent[] {
    return [...this.committedEvents.values()].map(clone);
  }

  eventsFor(orderId: string): OutboxEvent[] {
    return this.allEvents().filter((event) => event.aggregateId === orderId);
  }
}

class InMemoryTransaction {
  private readonly insertedOrders = new Map<string, Order>();
  private readonly updatedOrders = new Map<
    string,
    { order: Order; expectedVersion: number }
  >();
  private readonly appendedEvents = new Map<string, OutboxEvent>();
  private readonly changedEvents = new Map<
    string,
    { event: OutboxEvent; expectedStatus: OutboxStatus }
  >();

  readonly stores: TransactionStores;

  constructor(private readonly db: InMemoryDatabase) {
    this.stores = { orders: this.orderStore(), outbox: this.outboxStore() };
  }

  commit(): void {
    for (const order of this.insertedOrders.values()) {
      this.assertUnique(order, this.db.committedOrders.values());
    }
    for (const { order, expectedVersion } of this.updatedOrders.values()) {
      if (this.insertedOrders.has(order.id)) continue;
      const current = this.db.committedOrders.get(order.id);
      if (!current || current.version !== expectedVersion) {
        throw new ConflictError(order.id, expectedVersion);
      }
    }
    for (const { event, expectedStatus } of this.changedEvents.values()) {
      if (this.appendedEvents.has(event.id)) continue;
      const current = this.db.committedEvents.get(event.id);
      if (!current || current.status !== expectedStatus) {
        throw new Error(`Outbox event ${event.id} changed concurrently`);
      }
    }

    for (const order of this.insertedOrders.values()) {
      this.db.committedOrders.set(order.id, clone(order));
    }
    for (const { order } of this.updatedOrders.values()) {
      this.db.committedOrders.set(order.id, clone(order));
    }
    for (const event of this.appendedEvents.values()) {
      this.db.committedEvents.set(event.id, clone(event));
    }
    for (const { event } of this.changedEvents.values()) {
      this.db.committedEvents.set(event.id, clone(event));
    }
  }

  private visibleOrders(): Order[] {
    const rows = new Map(this.db.committedOrders);
    for (const [id, order] of this.insertedOrders) rows.set(id, order);
    for (const [id, { order }] of this.updatedOrders) rows.set(id, order);
    return [...rows.values()];
  }

  private visibleEvents(): OutboxEvent[] {
    const rows = new Map(this.db.committedEvents);
    for (const [id, event] of this.appendedEvents) rows.set(id, event);
    for (const [id, { event }] of this.changedEvents) rows.set(id, event);
    return [...rows.values()];
  }

  private assertUnique(order: Order, others: Iterable<Order>): void {
    for (const other of others) {
      if (other.id === order.id) {
        throw new UniqueConstraintViolation('orders_pkey');
      }
      if (other.orderNumber === order.orderNumber) {
        throw new UniqueConstraintViolation(ORDER_NUMBER_CONSTRAINT);
      }
      if (
        order.idempotencyKey !== null &&
        other.idempotencyKey === order.idempotencyKey
      ) {
        throw new UniqueConstraintViolation(IDEMPOTENCY_KEY_CONSTRAINT);
      }
    }
  }

  private changeEvent(
    id: string,
    mutate: (event: OutboxEvent) => void,
  ): OutboxEvent | null {
    const current = this.visibleEvents().find((event) => event.id === id);
    if (!current) return null;
    const expectedStatus =
      this.changedEvents.get(id)?.expectedStatus ?? current.status;
    const next = clone(current);
    mutate(next);
    if (this.appendedEvents.has(id)) {
      this.appendedEvents.set(id, next);
    } else {
      this.changedEvents.set(id, { event: next, expectedStatus });
    }
    return next;
  }

  private orderStore(): OrderStore {
    return {
      findById: async (id) => {
        const order = this.visibleOrders().find((o) => o.id === id);
        return order ? clone(order) : null;
      },
      findByIdempotencyKey: async (key) => {
        const order = this.visibleOrders().find(
          (o) => o.idempotencyKey === key,
        );
        return order ? clone(order) : null;
      },
      findByUser: async (userId, { limit, cursor }): Promise<OrderPage> => {
        const after = cursor ? decodeOrderCursor(cursor) : null;
        const rows = this.visibleOrders()
          .filter((o) => o.userId === userId)
          .sort(
            (a, b) =>
              b.createdAt.getTime() - a.createdAt.getTime() ||
              (a.id < b.id ? 1 : a.id > b.id ? -1 : 0),
          )
          .filter(
            (o) =>
              !after ||
              o.createdAt.getTime() < after.createdAt.getTime() ||
              (o.createdAt.getTime() === after.createdAt.getTime() &&
                o.id < after.id),
          );
        const slice = rows.slice(0, limit).map(clone);
        const last = slice[slice.length - 1];
        return {
          items: slice,
          nextCursor:
            rows.length > limit && last
              ? encodeOrderCursor({ createdAt: last.createdAt, id: last.id })
              : undefined,
        };
      },
      insert: async (order) => {
        this.assertUnique(order, this.visibleOrders());
        this.insertedOrders.set(order.id, clone(order));
      },
      update: async (order, expectedVersion) => {
        const current = this.visibleOrders().find((o) => o.id === order.id);
        if (!current || current.version !== expectedVersion) {
          throw new ConflictError(order.id, expectedVersion);
        }
        if (this.insertedOrders.has(order.id)) {
          this.insertedOrders.set(order.id, clone(order));
        } else {
          const staged = this.updatedOrders.get(order.id);
          this.updatedOrders.set(order.id, {
            order: clone(order),
            expectedVersion: staged?.expectedVersion ?? expectedVersion,
          });
        }
      },
    };
  }

  private outboxStore(): OutboxStore {
    return {
      append: async (event) => {
        if (this.visibleEvents().some((e) => e.id === event.id)) {
          throw new UniqueConstraintViolation('outbox_events_pkey');
        }
        this.appendedEvents.set(event.id, clone(event));
      },
      findById: async (id) => {
        const event = this.visibleEvents().find((e) => e.id === id);
        return event ? clone(event) : null;
      },
      fetchPending: async (limit, olderThan = new Date()) =>
        this.visibleEvents()
          .map((event, index) => ({ event, index }))
          .filter(
            ({ event }) =>
              event.status === 'PENDING' &&
              event.createdAt.getTime() <= olderThan.getTime(),
          )
          .sort(
            (a, b) =>
              a.event.createdAt.getTime() - b.event.createdAt.getTime() ||
              a.index - b.index,
          )
          .slice(0, limit)
          .map(({ event }) => clone(event)),
      markProcessed: async (id, at = new Date()) => {
        const current = this.visibleEvents().find((e) => e.id === id);
        if (!current || current.status !== 'PENDING') return false;
        this.changeEvent(id, (event) => {
          event.status = 'PROCESSED';
          event.processedAt = at;
        });
        return true;
      },
      recordFailure: async (id, error, maxRetries): Promise<FailureOutcome> => {
        const current = this.visibleEvents().find((e) => e.id === id);
        if (!current || current.status !== 'PENDING') {
          return { status: 'SKIPPED' };
        }
        const retryCount = current.retryCount + 1;
        const status = retryCount >= maxRetries ? 'FAILED' : 'PENDING';
        this.changeEvent(id, (event) => {
          event.retryCount = retryCount;
          event.status = status;
          event.errorMessage = error;
        });
        return { status, retryCount };
      },
      markFailed: async (id, error) => {
        const current = this.visibleEvents().find((e) => e.id === id);
        if (!current || current.status !== 'PENDING') return false;
        this.changeEvent(id, (event) => {
          event.status = 'FAILED';
          event.errorMessage = error;
        });
        return true;
      },
      findFailed: async (limit) =>
        this.visibleEvents()
          .filter((e) => e.status === 'FAILED')
          .sort(
            (a, b) =>
              a.createdAt.getTime() - b.createdAt.getTime() ||
              (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
          )
          .slice(0, limit)
          .map(clone),
      requeue: async (id) => {
        const current = this.visibleEvents().find((e) => e.id === id);
        if (!current || current.status !== 'FAILED') return false;
        this.changeEvent(id, (event) => {
          event.status = 'PENDING';
          event.retryCount = 0;
          event.errorMessage = null;
        });
        return true;
      },
      countByStatus: async () => {
        const counts: Record<OutboxStatus, number> = {
          PENDING: 0,
          PROCESSED: 0,
          FAILED: 0,
        };
        for (const event of this.visibleEvents()) counts[event.status] += 1;
        return counts;
      },
    };
  }
}
