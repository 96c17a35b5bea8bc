import { v4 as uuid } from 'uuid';
import type {
  JsonObject,
  OutboxEvent,
} from '../outbox/outbox-event.entity';
import type { OrderItem } from './order-item.entity';
import type { OrderStatus } from './order-status';
import type { Order } from './order.entity';

export const ORDER_AGGREGATE = 'ORDER';

const EVENT_TYPES: Record<OrderStatus, string> = {
  CREATED: 'OrderCreated',
  PAYMENT_PENDING: 'OrderPaymentPending',
  PAYMENT_CONFIRMED: 'OrderPaymentConfirmed',
  PROCESSING: 'OrderProcessing',
  COMPLETED: 'OrderCompleted',
  CANCELLED: 'OrderCancelled',
};

export function eventTypeFor(status: OrderStatus): string {
  return EVENT_TYPES[status];
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function itemSnapshot(item: OrderItem): JsonObject {
  return {
    id: item.id,
    productId: item.productId,
    productName: item.productName,
    quantity: item.quantity,
    unitPrice: item.unitPrice,
    totalPrice: item.totalPrice,
  };
}

/** Serializable view of an order, used for event payloads and API responses. */
export function orderSnapshot(order: Order): JsonObject {
  return {
    id: order.id,
    orderNumber: order.orderNumber,
    userId: order.userId,
    status: order.status,
    totalAmount: order.totalAmount,
    currency: order.currency,
    version: order.version,
    createdAt: order.createdAt.toISOString(),
    updatedAt: order.updatedAt.toISOString(),
    completedAt: iso(order.completedAt),
    cancelledAt: iso(order.cancelledAt),
    cancellationReason: order.cancellationReason,
    totalItems: order.items.reduce((sum, item) => sum + item.quantity, 0),
    items: order.items.map(itemSnapshot),
  };
}

/**
 * Builds the outbox row describing `order` after a mutation. The payload is a
 * full snapshot so consumers never need to call back into this service.
 */
export function buildOrderEvent(
  order: Order,
  previousStatus: OrderStatus | null,
  traceId?: string,
): OutboxEvent {
  const id = uuid();
  const eventType = eventTypeFor(order.status);
  const payload: JsonObject = {
    eventId: id,
    eventType,
    occurredAt: order.updatedAt.toISOString(),
    previousStatus,
    order: orderSnapshot(order),
  };
  if (traceId) payload.traceId = traceId;

  return {
    id,
    aggregateType: ORDER_AGGREGATE,
    aggregateId: order.id,
    eventType,
    payload,
    status: 'PENDING',
    retryCount: 0,
    errorMessage: null,
    createdAt: order.updatedAt,
    processedAt: null,
  };
}
