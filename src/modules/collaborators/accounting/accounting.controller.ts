import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import type { OrderEventType } from '../../checkout/domain';
import { AccountingService } from './accounting.service';
import { OrderEventDto } from './order-event.dto';

@Controller('orders')
export class AccountingController {
  private readonly logger = createLogger(AccountingController.name);

  constructor(private readonly accounting: AccountingService) {}

  @Post()
  @HttpCode(200)
  publish(@Body() event: OrderEventDto): { accepted: boolean } {
    this.accounting.record(event.type);
    this.logger.info('order_event_recorded', {
      event: 'order_event_recorded',
      eventType: event.type,
      userId: event.userId,
      status: typeof event.order.status === 'string' ? event.order.status : null,
    });

    return { accepted: true };
  }

  @Get('summary')
  summary(): Record<OrderEventType, number> {
    return this.accounting.summary();
  }
}
