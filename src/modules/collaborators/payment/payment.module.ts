import { Module } from '@nestjs/common';
import { provideRandomFailurePolicy } from '../shared/failure-policy';
import { PaymentController } from './payment.controller';
import { PaymentService } from './payment.service';

@Module({
  controllers: [PaymentController],
  providers: [PaymentService, provideRandomFailurePolicy('PAYMENT_FAILURE_RATE')],
})
export class PaymentModule {}
