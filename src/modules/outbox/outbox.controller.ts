import { Controller, Get, Param, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ListFailedQueryDto } from './dto/list-failed.dto';
import { OutboxEvent } from './outbox-event.entity';
import { OutboxPublisher } from './outbox.publisher';

function present(event: OutboxEvent) {
  return {
    id: event.id,
    aggregateType: event.aggregateType,
    aggregateId: event.aggregateId,
    eventType: event.eventType,
    status: event.status,
    retryCount: event.retryCount,
    errorMessage: event.errorMessage,
    createdAt: event.createdAt.toISOString(),
    processedAt: event.processedAt ? event.processedAt.toISOString() : null,
  };
}

@ApiTags('outbox')
@Controller('outbox')
export class OutboxController {
  constructor(private readonly outboxPublisher: OutboxPublisher) {}

  @Get('failed')
  async listFailed(@Query() query: ListFailedQueryDto) {
    const events = await this.outboxPublisher.listFailed(query.limit ?? 50);
    return { items: events.map(present) };
  }

  @Post(':id/requeue')
  async requeue(@Param('id', new ParseUUIDPipe()) id: string) {
    return present(await this.outboxPublisher.requeue(id));
  }
}
