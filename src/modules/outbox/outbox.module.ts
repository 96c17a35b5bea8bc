import { Module } from '@nestjs/common';
import { OutboxController } from './outbox.controller';
import { OutboxPublisher } from './outbox.publisher';

@Module({
  providers: [OutboxPublisher],
  controllers: [OutboxController],
  exports: [OutboxPublisher],
})
export class OutboxModule {}
