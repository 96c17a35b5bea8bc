import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kafka, type Producer } from 'kafkajs';
import { describeError } from '../common/errors/domain-errors';
import { KAFKA_CLIENT, KAFKA_PRODUCER } from './events.constants';
import { EventsPublisher } from './events.publisher';

@Global()
@Module({
  providers: [
    {
      provide: KAFKA_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new Kafka({
          clientId: config.get<string>('kafka.clientId', 'order-service'),
          brokers: config.get<string[]>('kafka.brokers', ['localhost:9092']),
        }),
    },
    {
      provide: KAFKA_PRODUCER,
      inject: [KAFKA_CLIENT],
      useFactory: async (kafka: Pick<Kafka, 'producer'>) => {
        // idempotent producer: broker-side dedupe of retried sends
        const producer = kafka.producer({
          idempotent: true,
          maxInFlightRequests: 1,
        });
        try {
          await producer.connect();
        } catch (error) {
          // send() reconnects on its own; the outbox keeps events PENDING meanwhile
          new Logger(EventsModule.name).error(
            `Kafka producer could not connect at startup: ${describeError(error)}`,
            error instanceof Error ? error.stack : undefined,
          );
        }
        return producer;
      },
    },
    EventsPublisher,
  ],
  exports: [KAFKA_PRODUCER, EventsPublisher],
})
export class EventsModule implements OnApplicationShutdown {
  constructor(@Inject(KAFKA_PRODUCER) private readonly producer: Producer) {}

  async onApplicationShutdown() {
    await this.producer.disconnect();
  }
}
