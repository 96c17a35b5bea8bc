import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KafkaJSProtocolError, type Producer } from 'kafkajs';
import type {
  JsonObject,
  OutboxEvent,
} from '../modules/outbox/outbox-event.entity';
import { EventEnvelope } from './event-envelope';
import { KAFKA_PRODUCER } from './events.constants';

export type KafkaSender = Pick<Producer, 'send'>;

/**
 * Broker rejections that will fail the same way on every attempt, such as an
 * oversized message or a topic the client is not authorized for.
 */
export function isPermanentPublishError(error: unknown): boolean {
  return error instanceof KafkaJSProtocolError && !error.retriable;
}

/**
 * Forwards committed outbox events to Kafka. One topic per aggregate type,
 * keyed by aggregate id so a single order's events share a partition.
 */
@Injectable()
export class EventsPublisher {
  private readonly logger = new Logger(EventsPublisher.name);
  private readonly source: string;
  private readonly topicPrefix: string;

  constructor(
    @Inject(KAFKA_PRODUCER) private readonly producer: KafkaSender,
    config: ConfigService,
  ) {
    this.source = config.get<string>('app.serviceName', 'order-service');
    this.topicPrefix = config.get<string>('kafka.topicPrefix', 'events');
  }

  topicFor(aggregateType: string): string {
    return `${this.topicPrefix}.${aggregateType.toLowerCase()}`;
  }

  toEnvelope(event: OutboxEvent): EventEnvelope {
    const traceId = event.payload.traceId;
    return {
      id: event.id,
      type: event.eventType,
      source: this.source,
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
      time: event.createdAt.toISOString(),
      schemaVersion: '1',
      traceId: typeof traceId === 'string' ? traceId : undefined,
      data: event.payload,
    };
  }

  async publish(event: OutboxEvent): Promise<EventEnvelope<JsonObject>> {
    const envelope = this.toEnvelope(event);
    const topic = this.topicFor(event.aggregateType);

    await this.producer.send({
      topic,
      messages: [
        {
          key: event.aggregateId,
          value: JSON.stringify(envelope),
          headers: {
            'event-id': event.id,
            'event-type': event.eventType,
          },
        },
      ],
    });

    this.logger.debug(
      `Published ${event.eventType} ${event.id} for ${event.aggregateType}/${event.aggregateId} to ${topic}`,
    );
    return envelope;
  }
}
