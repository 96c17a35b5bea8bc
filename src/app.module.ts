import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import appConfig from './config/app.config';
import databaseConfig from './config/database.config';
import kafkaConfig from './config/kafka.config';
import ordersConfig from './config/orders.config';
import outboxConfig from './config/outbox.config';
import { DatabaseModule } from './database/database.module';
import { EventsModule } from './events/events.module';
import { HealthModule } from './modules/health/health.module';
import { OrdersModule } from './modules/orders/orders.module';
import { OutboxModule } from './modules/outbox/outbox.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, kafkaConfig, ordersConfig, outboxConfig],
    }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    EventsModule,
    OrdersModule,
    OutboxModule,
    HealthModule,
  ],
})
export class AppModule {}
