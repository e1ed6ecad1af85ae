import { Module } from '@nestjs/common';
import { provideRandomFailurePolicy } from '../shared/failure-policy';
import { ShippingController } from './shipping.controller';
import { ShippingService } from './shipping.service';

@Module({
  controllers: [ShippingController],
  providers: [ShippingService, provideRandomFailurePolicy('SHIPPING_FAILURE_RATE')],
})
export class ShippingModule {}
