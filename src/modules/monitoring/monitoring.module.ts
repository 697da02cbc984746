import { Module } from '@nestjs/common';
import { TradeLogService } from './trade-log.service';
import { SessionReportService } from './session-report.service';

@Module({
  providers: [TradeLogService, SessionReportService],
  exports: [TradeLogService],
})
export class MonitoringModule {}
