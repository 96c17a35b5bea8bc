import {
  BeforeApplicationShutdown,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { firstValueFrom, from, throwError, timeout } from 'rxjs';
import {
  NotFoundError,
  PublishFailure,
  ValidationError,
  describeError,
} from '../../common/errors/domain-errors';
import type { OutboxConfig } from '../../config/outbox.config';
import { UnitOfWork } from '../../database/unit-of-work';
import {
  EventsPublisher,
  isPermanentPublishError,
} from '../../events/events.publisher';
import { OutboxEvent } from './outbox-event.entity';

export type PublishOutcome = 'processed' | 'retried' | 'failed' | 'skipped';

export type PublishCycleResult = Record<PublishOutcome, number> & {
  fetched: number;
};

/**
 * Relays committed outbox rows to the broker. Runs on a fixed interval and
 * talks to the order service only through the outbox table, so a restart
 * resumes from whatever is still PENDING.
 */
@Injectable()
export class OutboxPublisher
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  static readonly INTERVAL_NAME = 'outbox-publisher';

  private readonly logger = new Logger(OutboxPublisher.name);
  private readonly settings: OutboxConfig;
  private inFlight: Promise<PublishCycleResult> | null = null;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly eventsPublisher: EventsPublisher,
    private readonly schedulerRegistry: SchedulerRegistry,
    config: ConfigService,
  ) {
    this.settings = {
      enabled: config.get<boolean>('outbox.enabled', true),
      pollIntervalMs: config.get<number>('outbox.pollIntervalMs', 1000),
      batchSize: config.get<number>('outbox.batchSize', 100),
      maxRetries: config.get<number>('outbox.maxRetries', 3),
      publishTimeoutMs: config.get<number>('outbox.publishTimeoutMs', 5000),
    };
  }

  onApplicationBootstrap() {
    if (this.settings.enabled) {
      this.start();
    } else {
      this.logger.warn('Outbox publisher disabled by configuration');
    }
  }

  async beforeApplicationShutdown() {
    await this.stop();
  }

  isRunning(): boolean {
    return this.schedulerRegistry.doesExist(
      'interval',
      OutboxPublisher.INTERVAL_NAME,
    );
  }

  start(): void {
    if (this.isRunning()) return;

    const handle = setInterval(() => this.tick(), this.settings.pollIntervalMs);
    this.schedulerRegistry.addInterval(OutboxPublisher.INTERVAL_NAME, handle);
    this.logger.log(
      `Outbox publisher started (every ${this.settings.pollIntervalMs}ms, batch ${this.settings.batchSize}, max retries ${this.settings.maxRetries})`,
    );
  }

  /** Stops polling and waits for a cycle that is already running. */
  async stop(): Promise<void> {
    if (this.isRunning()) {
      this.schedulerRegistry.deleteInterval(OutboxPublisher.INTERVAL_NAME);
      this.logger.log('Outbox publisher stopped');
    }
    if (this.inFlight) {
      try {
        await this.inFlight;
      } catch (error) {
        this.logger.warn(
          `In-flight outbox cycle ended with an error: ${describeError(error)}`,
        );
      }
    }
  }

  /**
   * Runs one publish cycle. Concurrent callers share the cycle already in
   * progress instead of starting a second one.
   */
  publishPending(): Promise<PublishCycleResult> {
    if (this.inFlight) return this.inFlight;

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  async listFailed(limit = 50): Promise<OutboxEvent[]> {
    return this.unitOfWork.outbox.findFailed(limit);
  }

  /** Puts a dead-lettered event back in the queue with a fresh retry budget. */
  async requeue(eventId: string): Promise<OutboxEvent> {
    const event = await this.unitOfWork.outbox.findById(eventId);
    if (!event) {
      throw NotFoundError.outboxEvent(eventId);
    }
    if (event.status !== 'FAILED') {
      throw new ValidationError(
        `Only FAILED events can be requeued, event ${eventId} is ${event.status}`,
        { eventId, status: event.status },
      );
    }

    await this.unitOfWork.outbox.requeue(eventId);
    this.logger.log(`Requeued outbox event ${eventId} (${event.eventType})`);

    const requeued = await this.unitOfWork.outbox.findById(eventId);
    if (!requeued) {
      throw NotFoundError.outboxEvent(eventId);
    }
    return requeued;
  }

  private tick(): void {
    if (this.inFlight) return;
    this.publishPending().catch((error: unknown) => {
      this.logger.error(
        `Outbox cycle failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    });
  }

  private async runCycle(): Promise<PublishCycleResult> {
    const events = await this.unitOfWork.outbox.fetchPending(
      this.settings.batchSize,
      new Date(),
    );

    const result: PublishCycleResult = {
      fetched: events.length,
      processed: 0,
      retried: 0,
      failed: 0,
      skipped: 0,
    };

    // sequential, in fetch order; one event's failure never stops the batch
    for (const event of events) {
      result[await this.publishOne(event)] += 1;
    }

    if (events.length > 0) {
      this.logger.log(
        `Outbox cycle: ${result.fetched} fetched, ${result.processed} processed, ${result.retried} retried, ${result.failed} failed, ${result.skipped} skipped`,
      );
    }
    return result;
  }

  private async publishOne(event: OutboxEvent): Promise<PublishOutcome> {
    try {
      try {
        await this.send(event);
      } catch (error) {
        const failure = new PublishFailure(event.id, error);
        return isPermanentPublishError(error)
          ? await this.deadLetter(event, failure)
          : await this.handleFailure(event, failure);
      }

      const changed = await this.unitOfWork.outbox.markProcessed(
        event.id,
        new Date(),
      );
      return changed ? 'processed' : 'skipped';
    } catch (error) {
      // bookkeeping failed; the row is still PENDING and will be sent again
      this.logger.error(
        `Could not record outcome for outbox event ${event.id}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return 'skipped';
    }
  }

  private async send(event: OutboxEvent): Promise<void> {
    const limit = this.settings.publishTimeoutMs;
    await firstValueFrom(
      from(this.eventsPublisher.publish(event)).pipe(
        timeout({
          first: limit,
          with: () =>
            throwError(
              () => new Error(`Broker did not acknowledge within ${limit}ms`),
            ),
        }),
      ),
    );
  }

  private async deadLetter(
    event: OutboxEvent,
    failure: PublishFailure,
  ): Promise<PublishOutcome> {
    const changed = await this.unitOfWork.outbox.markFailed(
      event.id,
      failure.message,
    );
    if (!changed) return 'skipped';
    this.logger.error(
      `Outbox event ${event.id} (${event.eventType} ${event.aggregateType}/${event.aggregateId}) rejected permanently, marked FAILED: ${failure.message}`,
    );
    return 'failed';
  }

  private async handleFailure(
    event: OutboxEvent,
    failure: PublishFailure,
  ): Promise<PublishOutcome> {
    const outcome = await this.unitOfWork.outbox.recordFailure(
      event.id,
      failure.message,
      this.settings.maxRetries,
    );

    switch (outcome.status) {
      case 'FAILED':
        this.logger.error(
          `Outbox event ${event.id} (${event.eventType} ${event.aggregateType}/${event.aggregateId}) marked FAILED after ${outcome.retryCount} attempts: ${failure.message}`,
        );
        return 'failed';
      case 'PENDING':
        this.logger.warn(
          `Publish attempt ${outcome.retryCount}/${this.settings.maxRetries} failed for outbox event ${event.id}: ${failure.message}`,
        );
        return 'retried';
      case 'SKIPPED':
        return 'skipped';
    }
  }
}
