import {
  Body,
  Controller,
  Get,
  Headers,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiHeader, ApiTags } from '@nestjs/swagger';
import { CorrelationId } from '../../common/decorators/correlation-id.decorator';
import { CreateOrderDto } from './dto/create-order.dto';
import { ListOrdersQueryDto } from './dto/list-orders.dto';
import { CancelOrderDto, TransitionOrderDto } from './dto/transition-order.dto';
import { orderSnapshot } from './order-events';
import { OrdersService } from './orders.service';

@ApiTags('orders')
@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @ApiHeader({ name: 'Idempotency-Key', required: false })
  async create(
    @Body() body: CreateOrderDto,
    @Headers('idempotency-key') idempotencyKey?: string,
    @CorrelationId() traceId?: string,
  ) {
    const order = await this.ordersService.createOrder(
      {
        userId: body.userId,
        currency: body.currency,
        items: body.items,
        idempotencyKey,
      },
      traceId,
    );
    return orderSnapshot(order);
  }

  @Get(':id')
  async get(@Param('id', new ParseUUIDPipe()) id: string) {
    return orderSnapshot(await this.ordersService.getOrder(id));
  }

  @Get()
  async list(@Query() query: ListOrdersQueryDto) {
    const page = await this.ordersService.listOrders(
      query.userId,
      query.limit ?? 20,
      query.cursor,
    );
    return {
      items: page.items.map(orderSnapshot),
      nextCursor: page.nextCursor,
    };
  }

  @Patch(':id/status')
  async transition(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() body: TransitionOrderDto,
    @CorrelationId() traceId?: string,
  ) {
    const order = await this.ordersService.transitionStatus(id, body.status, {
      reason: body.reason,
      traceId,
    });
    return orderSnapshot(order);
  }

  @Post(':id/cancel')
  async cancel(
    @Param('id', new ParseUUIDPipe()) id: string,
    @Body() body: CancelOrderDto,
    @CorrelationId() traceId?: string,
  ) {
    return orderSnapshot(
      await this.ordersService.cancelOrder(id, body.reason, traceId),
    );
  }
}
