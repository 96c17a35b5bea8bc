import { EntityManager, In, QueryFailedError } from 'typeorm';
import { ConflictError } from '../common/errors/domain-errors';
import { OrderItem } from '../modules/orders/order-item.entity';
import { Order } from '../modules/orders/order.entity';
import { decodeOrderCursor, encodeOrderCursor } from './order-cursor';
import { OrderPage, OrderStore, UniqueConstraintViolation } from './unit-of-work';

const PG_UNIQUE_VIOLATION = '23505';

export function asUniqueViolation(
  error: unknown,
): UniqueConstraintViolation | null {
  if (!(error instanceof QueryFailedError)) return null;
  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError) ||
    driverError.code !== PG_UNIQUE_VIOLATION
  ) {
    return null;
  }
  const constraint =
    'constraint' in driverError && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : 'unknown';
  return new UniqueConstraintViolation(constraint);
}

export class TypeOrmOrderStore implements OrderStore {
  constructor(private readonly manager: EntityManager) {}

  async findById(id: string): Promise<Order | null> {
    return this.manager.findOne(Order, {
      where: { id },
      relations: { items: true },
      order: { items: { position: 'ASC' } },
    });
  }

  async findByIdempotencyKey(key: string): Promise<Order | null> {
    return this.manager.findOne(Order, {
      where: { idempotencyKey: key },
      relations: { items: true },
      order: { items: { position: 'ASC' } },
    });
  }

  async findByUser(
    userId: string,
    options: { limit: number; cursor?: string },
  ): Promise<OrderPage> {
    const qb = this.manager
      .createQueryBuilder(Order, 'o')
      .where('o.user_id = :userId', { userId })
      .orderBy('o.created_at', 'DESC')
      .addOrderBy('o.id', 'DESC')
      .limit(options.limit + 1);

    if (options.cursor) {
      const { createdAt, id } = decodeOrderCursor(options.cursor);
      qb.andWhere(
        '(o.created_at < :createdAt OR (o.created_at = :createdAt AND o.id < :id))',
        { createdAt, id },
      );
    }

    const rows = await qb.getMany();
    const hasMore = rows.length > options.limit;
    const slice = rows.slice(0, options.limit);

    if (slice.length > 0) {
      const items = await this.manager.find(OrderItem, {
        where: { orderId: In(slice.map((o) => o.id)) },
        order: { position: 'ASC' },
      });
      for (const order of slice) {
        order.items = items.filter((item) => item.orderId === order.id);
      }
    }

    const last = slice[slice.length - 1];
    return {
      items: slice,
      nextCursor:
        hasMore && last
          ? encodeOrderCursor({ createdAt: last.createdAt, id: last.id })
          : undefined,
    };
  }

  async insert(order: Order): Promise<void> {
    const { items, ...columns } = order;
    try {
      await this.manager.insert(Order, columns);
      if (items.length > 0) {
        await this.manager.insert(
          OrderItem,
          items.map(({ order: _order, ...item }) => item),
        );
      }
    } catch (error) {
      throw asUniqueViolation(error) ?? error;
    }
  }

  async update(order: Order, expectedVersion: number): Promise<void> {
    const result = await this.manager
      .createQueryBuilder()
      .update(Order)
      .set({
        status: order.status,
        version: order.version,
        updatedAt: order.updatedAt,
        completedAt: order.completedAt,
        cancelledAt: order.cancelledAt,
        cancellationReason: order.cancellationReason,
      })
      .where('id = :id AND version = :expectedVersion', {
        id: order.id,
        expectedVersion,
      })
      .execute();

    if (!result.affected) {
      throw new ConflictError(order.id, expectedVersion);
    }
  }
}
