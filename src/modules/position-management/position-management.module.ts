import { Module } from '@nestjs/common';
import { ConnectorModule } from '../../connectors/connector.module';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { StatisticsModule } from '../statistics/statistics.module';
import { ExitEvaluatorService } from './exit-evaluator.service';
import { PositionManagerService } from './position-manager.service';
import { SIZING_POLICY } from './sizing/sizing-policy.constants';
import { createSizingPolicy } from './sizing/sizing-policy.factory';

@Module({
  imports: [ConnectorModule, StatisticsModule],
  providers: [
    ExitEvaluatorService,
    PositionManagerService,
    {
      provide: SIZING_POLICY,
      useFactory: (config: EngineConfig) => createSizingPolicy(config.risk.sizing),
      inject: [ENGINE_CONFIG],
    },
  ],
  exports: [PositionManagerService],
})
export class PositionManagementModule {}
