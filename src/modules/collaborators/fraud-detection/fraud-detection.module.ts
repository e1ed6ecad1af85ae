import { Module } from '@nestjs/common';
import { provideRandomFailurePolicy } from '../shared/failure-policy';
import { FraudDetectionController } from './fraud-detection.controller';
import { FraudDetectionService } from './fraud-detection.service';

@Module({
  controllers: [FraudDetectionController],
  providers: [FraudDetectionService, provideRandomFailurePolicy('FRAUD_FLAG_RATE')],
})
export class FraudDetectionModule {}
