import { Inject, Injectable } from '@nestjs/common';
import { IOrderGateway } from './common/interfaces/order-gateway.interface';
import { Position } from './common/types/position.type';
import { SessionStatsSnapshot } from './common/types/statistics.type';
import { ORDER_GATEWAY } from './connectors/connector.constants';
import { SchedulerService } from './core/scheduler.service';
import { PositionManagerService } from './modules/position-management/position-manager.service';
import { StatisticsService } from './modules/statistics/statistics.service';
import { HealthCheckResponseDto } from './common/dto/health-check-response.dto';
import {
  EngineStatusResponseDto,
  OpenPositionDto,
  SessionStatsDto,
} from './common/dto/engine-status-response.dto';

export const SERVICE_NAME = 'spread-arbitrage-engine';

@Injectable()
export class AppService {
  constructor(
    @Inject(ORDER_GATEWAY) private readonly gateway: IOrderGateway,
    private readonly scheduler: SchedulerService,
    private readonly positionManager: PositionManagerService,
    private readonly statistics: StatisticsService,
  ) {}

  getHealth(): HealthCheckResponseDto {
    return {
      data: {
        status: this.scheduler.isRunning() ? 'ok' : 'stopped',
        service: SERVICE_NAME,
        gatewayMode: this.gateway.getMode(),
      },
      timestamp: new Date().toISOString(),
    };
  }

  getStatus(): EngineStatusResponseDto {
    return {
      data: {
        gatewayMode: this.gateway.getMode(),
        running: this.scheduler.isRunning(),
        tickInProgress: this.scheduler.isCycleInProgress(),
        openPositions: this.positionManager
          .getOpenPositions()
          .map(toOpenPositionDto),
        stats: toSessionStatsDto(this.statistics.getSnapshot()),
      },
      timestamp: new Date().toISOString(),
    };
  }
}

function toOpenPositionDto(position: Position): OpenPositionDto {
  return {
    positionId: position.positionId,
    symbol: position.symbol,
    side: position.side,
    size: position.size.toString(),
    entryPrice: position.entryPrice.toString(),
    entrySpread: position.entrySpread.toString(),
    stopLossPrice: position.stopLossPrice.toString(),
    takeProfitPrice: position.takeProfitPrice.toString(),
    entryTime: position.entryTime.toISOString(),
    status: position.status,
    isPaper: position.isPaper,
  };
}

function toSessionStatsDto(snapshot: SessionStatsSnapshot): SessionStatsDto {
  return {
    totalTrades: snapshot.totalTrades,
    winningTrades: snapshot.winningTrades,
    winRate: snapshot.winRate,
    totalPnl: snapshot.totalPnl.toString(),
    dailyPnl: snapshot.dailyPnl.toString(),
    dailyTradeCount: snapshot.dailyTradeCount,
    lastResetDate: snapshot.lastResetDate,
    opportunitiesDetected: snapshot.opportunitiesDetected,
    startedAt: snapshot.startedAt.toISOString(),
  };
}
