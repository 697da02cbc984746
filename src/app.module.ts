import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { loggerConfig } from './common/config/logger.config';
import { EngineConfigModule } from './common/config/engine-config.module';
import { ConnectorModule } from './connectors/connector.module';
import { CoreModule } from './core/core.module';
import { PositionManagementModule } from './modules/position-management/position-management.module';
import { StatisticsModule } from './modules/statistics/statistics.module';
import { MonitoringModule } from './modules/monitoring/monitoring.module';
import { SystemErrorFilter } from './common/filters/system-error.filter';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
    }),
    ScheduleModule.forRoot(), // SchedulerRegistry for the tick timer
    EngineConfigModule,
    ConnectorModule,
    CoreModule,
    PositionManagementModule,
    StatisticsModule,
    MonitoringModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_FILTER, useClass: SystemErrorFilter }],
})
export class AppModule {}
