import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import { OrderConfirmationRequestDto } from './order-confirmation-request.dto';

@Controller()
export class EmailController {
  private readonly logger = createLogger(EmailController.name);

  @Post('send-order-confirmation')
  @HttpCode(200)
  sendOrderConfirmation(@Body() body: OrderConfirmationRequestDto): { accepted: boolean } {
    this.logger.info('order_confirmation_sent', {
      event: 'order_confirmation_sent',
      userId: body.userId,
      email: body.email ?? `${body.userId}@example.com`,
      orderId: typeof body.order.orderId === 'string' ? body.order.orderId : null,
    });

    return { accepted: true };
  }
}
