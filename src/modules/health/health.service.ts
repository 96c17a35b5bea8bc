import { Injectable, Logger } from '@nestjs/common';
import { describeError } from '../../common/errors/domain-errors';
import { UnitOfWork } from '../../database/unit-of-work';
import type { OutboxStatus } from '../outbox/outbox-event.entity';

export interface Readiness {
  status: 'ready' | 'not_ready';
  checks: { database: 'up' | 'down' };
  outbox?: Record<OutboxStatus, number>;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(private readonly unitOfWork: UnitOfWork) {}

  async getReadiness(): Promise<Readiness> {
    const result: Readiness = {
      status: 'not_ready',
      checks: { database: 'down' },
    };

    try {
      await this.unitOfWork.ping();
      result.checks.database = 'up';
      // FAILED is the operator-visible dead-letter signal
      result.outbox = await this.unitOfWork.outbox.countByStatus();
    } catch (error) {
      this.logger.warn(`Readiness check failed: ${describeError(error)}`);
    }

    result.status = result.checks.database === 'up' ? 'ready' : 'not_ready';
    return result;
  }
}
