import {
  Column,
  Entity,
  Index,
  OneToMany,
  PrimaryColumn,
  Unique,
} from 'typeorm';
import { OrderItem } from './order-item.entity';
import type { OrderStatus } from './order-status';

@Entity({ name: 'orders' })
@Unique('uq_orders_order_number', ['orderNumber'])
@Unique('uq_orders_idempotency_key', ['idempotencyKey'])
@Index(['userId', 'createdAt', 'id'])
export class Order {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'order_number', type: 'varchar', length: 50 })
  orderNumber!: string;

  @Column({ name: 'user_id', type: 'varchar', length: 100 })
  userId!: string;

  @Column({ type: 'varchar', length: 50 })
  @Index()
  status!: OrderStatus;

  @Column({ name: 'total_amount', type: 'decimal', precision: 19, scale: 2 })
  totalAmount!: string;

  @Column({ type: 'varchar', length: 3, default: 'USD' })
  currency!: string;

  @Column({
    name: 'idempotency_key',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  idempotencyKey!: string | null;

  @Column({ type: 'int' })
  version!: number;

  @OneToMany(() => OrderItem, (item) => item.order)
  items!: OrderItem[];

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @Column({ name: 'cancelled_at', type: 'timestamptz', nullable: true })
  cancelledAt!: Date | null;

  @Column({ name: 'cancellation_reason', type: 'text', nullable: true })
  cancellationReason!: string | null;
}
