import { Module } from '@nestjs/common';
import { EngineLifecycleService } from './engine-lifecycle.service';
import { TradingEngineService } from './trading-engine.service';
import { SchedulerService } from './scheduler.service';
import { ConnectorModule } from '../connectors/connector.module';
import { MarketDataModule } from '../modules/market-data/market-data.module';
import { OpportunityDetectionModule } from '../modules/opportunity-detection/opportunity-detection.module';
import { PositionManagementModule } from '../modules/position-management/position-management.module';
import { StatisticsModule } from '../modules/statistics/statistics.module';

/**
 * Engine orchestration: the tick pipeline, the polling loop and the
 * startup/shutdown hooks.
 */
@Module({
  imports: [
    ConnectorModule, // Quote sources and gateway for connect/disconnect
    MarketDataModule,
    OpportunityDetectionModule,
    PositionManagementModule,
    StatisticsModule,
  ],
  providers: [EngineLifecycleService, TradingEngineService, SchedulerService],
  exports: [TradingEngineService, SchedulerService],
})
export class CoreModule {}
