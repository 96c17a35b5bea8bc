import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialOrderSchema1729300000000 implements MigrationInterface {
  name = 'InitialOrderSchema1729300000000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id UUID PRIMARY KEY,
        order_number VARCHAR(50) NOT NULL,
        user_id VARCHAR(100) NOT NULL,
        status VARCHAR(50) NOT NULL,
        total_amount DECIMAL(19, 2) NOT NULL,
        currency VARCHAR(3) NOT NULL DEFAULT 'USD',
        idempotency_key VARCHAR(255),
        version INTEGER NOT NULL DEFAULT 1,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        completed_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        cancellation_reason TEXT,
        CONSTRAINT uq_orders_order_number UNIQUE (order_number),
        CONSTRAINT uq_orders_idempotency_key UNIQUE (idempotency_key)
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_orders_user_created ON orders (user_id, created_at DESC, id DESC)`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_orders_status ON orders (status)`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS order_items (
        id UUID PRIMARY KEY,
        order_id UUID NOT NULL REFERENCES orders (id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        product_id VARCHAR(100) NOT NULL,
        product_name VARCHAR(255) NOT NULL,
        quantity INTEGER NOT NULL,
        unit_price DECIMAL(19, 2) NOT NULL,
        total_price DECIMAL(19, 2) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT chk_order_items_quantity_positive CHECK (quantity > 0)
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_order_items_order_id ON order_items (order_id)`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_order_items_product_id ON order_items (product_id)`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS outbox_events (
        id UUID PRIMARY KEY,
        aggregate_type VARCHAR(100) NOT NULL,
        aggregate_id VARCHAR(255) NOT NULL,
        event_type VARCHAR(100) NOT NULL,
        payload JSONB NOT NULL,
        status VARCHAR(50) NOT NULL DEFAULT 'PENDING',
        retry_count INTEGER NOT NULL DEFAULT 0,
        error_message TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        processed_at TIMESTAMPTZ
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_outbox_events_pending ON outbox_events (created_at, id) WHERE status = 'PENDING'`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_outbox_events_status ON outbox_events (status)`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_outbox_events_aggregate ON outbox_events (aggregate_type, aggregate_id)`,
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS outbox_events`);
    await queryRunner.query(`DROP TABLE IF EXISTS order_items`);
    await queryRunner.query(`DROP TABLE IF EXISTS orders`);
  }
}
