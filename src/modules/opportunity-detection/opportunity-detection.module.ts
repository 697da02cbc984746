import { Module } from '@nestjs/common';
import { OpportunityScannerService } from './opportunity-scanner.service';

@Module({
  providers: [OpportunityScannerService],
  exports: [OpportunityScannerService],
})
export class OpportunityDetectionModule {}
