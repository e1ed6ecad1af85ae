import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import type { FraudVerdict } from '../../checkout/domain';
import { FraudCheckRequestDto } from './fraud-check-request.dto';
import { FraudDetectionService } from './fraud-detection.service';

@Controller()
export class FraudDetectionController {
  private readonly logger = createLogger(FraudDetectionController.name);

  constructor(private readonly fraudDetection: FraudDetectionService) {}

  @Post('check')
  @HttpCode(200)
  check(@Body() body: FraudCheckRequestDto): FraudVerdict {
    const verdict = this.fraudDetection.check(body);
    if (verdict.flagged) {
      this.logger.security('order_flagged', {
        event: 'order_flagged',
        orderId: body.orderId,
        fraudReason: verdict.reason,
      });
    }

    return verdict;
  }
}
