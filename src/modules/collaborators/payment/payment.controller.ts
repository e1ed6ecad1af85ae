import { Body, Controller, HttpCode, HttpException, HttpStatus, Post } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import { ChargeRequestDto, ReversalRequestDto } from './payment-request.dto';
import { PaymentDeclinedError, PaymentService } from './payment.service';

@Controller()
export class PaymentController {
  private readonly logger = createLogger(PaymentController.name);

  constructor(private readonly payments: PaymentService) {}

  @Post('charge')
  @HttpCode(200)
  charge(@Body() body: ChargeRequestDto): { transactionId: string } {
    try {
      return this.payments.charge(body);
    } catch (error: unknown) {
      if (error instanceof PaymentDeclinedError) {
        this.logger.warn('payment_declined', { event: 'payment_declined', orderId: body.orderId });
        throw new HttpException(error.message, HttpStatus.PAYMENT_REQUIRED);
      }

      throw error;
    }
  }

  @Post('reversals')
  @HttpCode(200)
  reverse(@Body() body: ReversalRequestDto): { reversalId: string } {
    const reversal = this.payments.reverse(body);
    this.logger.info('payment_reversed', {
      event: 'payment_reversed',
      orderId: body.orderId,
      transactionId: body.transactionId,
      known: reversal.known,
    });

    return { reversalId: reversal.reversalId };
  }
}
