import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuid } from 'uuid';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../common/errors/domain-errors';
import { fromMinorUnits, toMinorUnits } from '../../common/money';
import {
  ORDER_NUMBER_CONSTRAINT,
  OrderPage,
  UniqueConstraintViolation,
  UnitOfWork,
} from '../../database/unit-of-work';
import type { OrdersConfig } from '../../config/orders.config';
import { buildOrderEvent } from './order-events';
import { OrderItem } from './order-item.entity';
import { OrderStatus, transition } from './order-status';
import { Order } from './order.entity';

export interface CreateOrderItemInput {
  productId: string;
  productName: string;
  quantity: number;
  /** Decimal string, e.g. "10.00". */
  unitPrice: string;
}

export interface CreateOrderInput {
  userId: string;
  items: CreateOrderItemInput[];
  idempotencyKey?: string | null;
  currency?: string;
}

export interface TransitionInput {
  reason?: string;
  traceId?: string;
}

const ORDER_NUMBER_ATTEMPTS = 3;
export const MAX_IDEMPOTENCY_KEY_LENGTH = 255;
const MAX_PAGE_SIZE = 100;

export function generateOrderNumber(at: Date = new Date()): string {
  const day = at.toISOString().slice(0, 10).replace(/-/g, '');
  const suffix = uuid().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `ORD-${day}-${suffix}`;
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);
  private readonly settings: OrdersConfig;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    config: ConfigService,
  ) {
    this.settings = {
      maxItems: config.get<number>('orders.maxItems', 50),
      defaultCurrency: config.get<string>('orders.defaultCurrency', 'USD'),
      maxConflictRetries: config.get<number>('orders.maxConflictRetries', 3),
    };
  }

  /**
   * Creates an order exactly once per idempotency key. A repeated key returns
   * the stored order untouched, including when two requests race past the
   * lookup and the unique index on idempotency_key picks the winner.
   */
  async createOrder(input: CreateOrderInput, traceId?: string): Promise<Order> {
    const idempotencyKey = input.idempotencyKey?.trim() || null;
    if (idempotencyKey && idempotencyKey.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new ValidationError(
        `Idempotency key cannot be longer than ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
        { length: idempotencyKey.length },
      );
    }

    if (idempotencyKey) {
      const existing =
        await this.unitOfWork.orders.findByIdempotencyKey(idempotencyKey);
      if (existing) {
        this.logger.debug(
          `Idempotent replay of ${idempotencyKey}, returning order ${existing.id}`,
        );
        return existing;
      }
    }

    this.validate(input);
    const currency = (input.currency ?? this.settings.defaultCurrency).toUpperCase();

    for (let attempt = 1; ; attempt++) {
      const order = this.buildOrder(input, idempotencyKey, currency);
      const event = buildOrderEvent(order, null, traceId);

      try {
        await this.unitOfWork.run(async ({ orders, outbox }) => {
          await orders.insert(order);
          await outbox.append(event);
        });
      } catch (error) {
        if (!(error instanceof UniqueConstraintViolation)) throw error;

        if (idempotencyKey && error.constraint !== ORDER_NUMBER_CONSTRAINT) {
          const winner =
            await this.unitOfWork.orders.findByIdempotencyKey(idempotencyKey);
          if (winner) {
            this.logger.debug(
              `Lost creation race on ${idempotencyKey}, returning order ${winner.id}`,
            );
            return winner;
          }
        }
        if (
          error.constraint === ORDER_NUMBER_CONSTRAINT &&
          attempt < ORDER_NUMBER_ATTEMPTS
        ) {
          continue;
        }
        throw error;
      }

      this.logger.log(
        `Created order ${order.orderNumber} (${order.id}) for user ${order.userId}, total ${order.totalAmount} ${order.currency}`,
      );
      return order;
    }
  }

  /**
   * Moves an order along the lifecycle and records the matching event in the
   * same transaction. Lost optimistic races are re-run from a fresh read.
   */
  async transitionStatus(
    orderId: string,
    newStatus: OrderStatus,
    input: TransitionInput = {},
  ): Promise<Order> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.unitOfWork.run(async ({ orders, outbox }) => {
          const order = await orders.findById(orderId);
          if (!order) {
            throw NotFoundError.order(orderId);
          }

          const next: Order = {
            ...transition(order, newStatus, { reason: input.reason }),
            version: order.version + 1,
          };
          await orders.update(next, order.version);
          await outbox.append(buildOrderEvent(next, order.status, input.traceId));

          this.logger.log(
            `Order ${orderId} ${order.status} -> ${newStatus} (v${next.version})`,
          );
          return next;
        });
      } catch (error) {
        if (
          error instanceof ConflictError &&
          attempt < this.settings.maxConflictRetries
        ) {
          this.logger.warn(
            `Version conflict on order ${orderId}, retrying (${attempt + 1}/${this.settings.maxConflictRetries})`,
          );
          continue;
        }
        throw error;
      }
    }
  }

  async cancelOrder(
    orderId: string,
    reason: string,
    traceId?: string,
  ): Promise<Order> {
    return this.transitionStatus(orderId, 'CANCELLED', { reason, traceId });
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.unitOfWork.orders.findById(orderId);
    if (!order) {
      throw NotFoundError.order(orderId);
    }
    return order;
  }

  async listOrders(
    userId: string,
    limit: number,
    cursor?: string,
  ): Promise<OrderPage> {
    const realLimit = Math.min(Math.max(limit || 20, 1), MAX_PAGE_SIZE);
    return this.unitOfWork.orders.findByUser(userId, {
      limit: realLimit,
      cursor,
    });
  }

  private validate(input: CreateOrderInput): void {
    if (!input.userId || input.userId.trim() === '') {
      throw new ValidationError('userId is required');
    }
    if (!Array.isArray(input.items) || input.items.length === 0) {
      throw new ValidationError('Order must contain at least one item');
    }
    if (input.items.length > this.settings.maxItems) {
      throw new ValidationError(
        `Order cannot contain more than ${this.settings.maxItems} items`,
        { itemCount: input.items.length, maxItems: this.settings.maxItems },
      );
    }
    if (input.currency !== undefined && !/^[A-Za-z]{3}$/.test(input.currency)) {
      throw new ValidationError(`Invalid currency: ${input.currency}`, {
        currency: input.currency,
      });
    }

    input.items.forEach((item, index) => {
      if (!item.productId || item.productId.trim() === '') {
        throw new ValidationError(`Item ${index} is missing productId`, {
          index,
        });
      }
      if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        throw new ValidationError(
          `Item ${index} quantity must be a positive integer`,
          { index, productId: item.productId, quantity: item.quantity },
        );
      }
      // throws ValidationError for malformed prices
      toMinorUnits(item.unitPrice);
    });
  }

  private buildOrder(
    input: CreateOrderInput,
    idempotencyKey: string | null,
    currency: string,
  ): Order {
    const now = new Date();
    const orderId = uuid();

    let totalMinor = 0;
    const items: OrderItem[] = input.items.map((line, position) => {
      const unitMinor = toMinorUnits(line.unitPrice);
      const lineMinor = unitMinor * line.quantity;
      totalMinor += lineMinor;
      return {
        id: uuid(),
        orderId,
        position,
        productId: line.productId,
        productName: line.productName,
        quantity: line.quantity,
        unitPrice: fromMinorUnits(unitMinor),
        totalPrice: fromMinorUnits(lineMinor),
        createdAt: now,
      };
    });

    if (!Number.isSafeInteger(totalMinor)) {
      throw new ValidationError('Order total is out of range');
    }

    return {
      id: orderId,
      orderNumber: generateOrderNumber(now),
      userId: input.userId,
      status: 'CREATED',
      totalAmount: fromMinorUnits(totalMinor),
      currency,
      idempotencyKey,
      version: 1,
      items,
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      cancelledAt: null,
      cancellationReason: null,
    };
  }
}
