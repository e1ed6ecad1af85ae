import { Body, Controller, HttpCode, Post, ServiceUnavailableException } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import type { Money } from '../../checkout/domain';
import { QuoteRequestDto, ShipRequestDto } from './shipping-request.dto';
import { ShipmentFailedError, ShippingService } from './shipping.service';

@Controller()
export class ShippingController {
  private readonly logger = createLogger(ShippingController.name);

  constructor(private readonly shipping: ShippingService) {}

  @Post('quote')
  @HttpCode(200)
  quote(@Body() body: QuoteRequestDto): { cost: Money } {
    return { cost: this.shipping.quote(body.items) };
  }

  @Post('ship')
  @HttpCode(200)
  ship(@Body() body: ShipRequestDto): { trackingId: string } {
    try {
      const shipment = this.shipping.ship(body.orderId);
      this.logger.info('shipment_scheduled', {
        event: 'shipment_scheduled',
        orderId: body.orderId,
        trackingId: shipment.trackingId,
      });
      return shipment;
    } catch (error: unknown) {
      if (error instanceof ShipmentFailedError) {
        throw new ServiceUnavailableException(error.message);
      }

      throw error;
    }
  }
}
