import { EntityManager, LessThanOrEqual } from 'typeorm';
import {
  OUTBOX_STATUSES,
  OutboxEvent,
  OutboxStatus,
} from '../modules/outbox/outbox-event.entity';
import { FailureOutcome, OutboxStore } from './unit-of-work';

export class TypeOrmOutboxStore implements OutboxStore {
  constructor(private readonly manager: EntityManager) {}

  async append(event: OutboxEvent): Promise<void> {
    await this.manager.insert(OutboxEvent, event);
  }

  async findById(id: string): Promise<OutboxEvent | null> {
    return this.manager.findOne(OutboxEvent, { where: { id } });
  }

  async fetchPending(
    limit: number,
    olderThan: Date = new Date(),
  ): Promise<OutboxEvent[]> {
    return this.manager.find(OutboxEvent, {
      where: { status: 'PENDING', createdAt: LessThanOrEqual(olderThan) },
      order: { createdAt: 'ASC', id: 'ASC' },
      take: limit,
    });
  }

  async markProcessed(id: string, at: Date = new Date()): Promise<boolean> {
    const result = await this.manager.update(
      OutboxEvent,
      { id, status: 'PENDING' },
      { status: 'PROCESSED', processedAt: at },
    );
    return Boolean(result.affected);
  }

  async recordFailure(
    id: string,
    error: string,
    maxRetries: number,
  ): Promise<FailureOutcome> {
    return this.manager.transaction(async (tx): Promise<FailureOutcome> => {
      const event = await tx.findOne(OutboxEvent, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!event || event.status !== 'PENDING') {
        return { status: 'SKIPPED' };
      }

      const retryCount = event.retryCount + 1;
      const status = retryCount >= maxRetries ? 'FAILED' : 'PENDING';
      await tx.update(
        OutboxEvent,
        { id },
        { retryCount, status, errorMessage: error },
      );
      return { status, retryCount };
    });
  }

  async markFailed(id: string, error: string): Promise<boolean> {
    const result = await this.manager.update(
      OutboxEvent,
      { id, status: 'PENDING' },
      { status: 'FAILED', errorMessage: error },
    );
    return Boolean(result.affected);
  }

  async findFailed(limit: number): Promise<OutboxEvent[]> {
    return this.manager.find(OutboxEvent, {
      where: { status: 'FAILED' },
      order: { createdAt: 'ASC', id: 'ASC' },
      take: limit,
    });
  }

  async requeue(id: string): Promise<boolean> {
    const result = await this.manager.update(
      OutboxEvent,
      { id, status: 'FAILED' },
      { status: 'PENDING', retryCount: 0, errorMessage: null },
    );
    return Boolean(result.affected);
  }

  async countByStatus(): Promise<Record<OutboxStatus, number>> {
    const rows = await this.manager
      .createQueryBuilder(OutboxEvent, 'e')
      .select('e.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('e.status')
      .getRawMany<{ status: string; count: string }>();

    const counts: Record<OutboxStatus, number> = {
      PENDING: 0,
      PROCESSED: 0,
      FAILED: 0,
    };
    for (const row of rows) {
      const status = OUTBOX_STATUSES.find((s) => s === row.status);
      if (status) counts[status] = parseInt(row.count, 10);
    }
    return counts;
  }
}
