import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

export const OUTBOX_STATUSES = ['PENDING', 'PROCESSED', 'FAILED'] as const;

export type OutboxStatus = (typeof OUTBOX_STATUSES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

@Entity({ name: 'outbox_events' })
@Index(['aggregateType', 'aggregateId'])
export class OutboxEvent {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'aggregate_type', type: 'varchar', length: 100 })
  aggregateType!: string;

  @Column({ name: 'aggregate_id', type: 'varchar', length: 255 })
  aggregateId!: string;

  @Column({ name: 'event_type', type: 'varchar', length: 100 })
  eventType!: string;

  @Column({ type: 'jsonb' })
  payload!: JsonObject;

  @Column({ type: 'varchar', length: 50, default: 'PENDING' })
  @Index()
  status!: OutboxStatus;

  @Column({ name: 'retry_count', type: 'int', default: 0 })
  retryCount!: number;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'created_at', type: 'timestamptz' })
  @Index()
  createdAt!: Date;

  @Column({ name: 'processed_at', type: 'timestamptz', nullable: true })
  processedAt!: Date | null;
}
