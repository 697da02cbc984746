import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import { EngineConfig } from '../common/config/engine-config.type';
import { EVENT_NAMES, SessionSummaryEvent } from '../common/events';
import { IOrderGateway, IQuoteSource } from '../common/interfaces';
import { GatewayBalance } from '../common/types/order.type';
import {
  getCorrelationId,
  withCorrelationId,
} from '../common/services/correlation-context';
import {
  COMPARISON_QUOTE_SOURCE,
  ORDER_GATEWAY,
  REFERENCE_QUOTE_SOURCE,
} from '../connectors/connector.constants';
import { MarketDataService } from '../modules/market-data/market-data.service';
import { PositionManagerService } from '../modules/position-management/position-manager.service';
import { StatisticsService } from '../modules/statistics/statistics.service';
import { SchedulerService } from './scheduler.service';

/**
 * Startup: connect collaborators, log the configuration and balance, start
 * the loop. Shutdown (SIGINT/SIGTERM via Nest shutdown hooks): stop the loop,
 * let the in-flight tick finish, close every position, publish the session
 * summary, disconnect.
 */
@Injectable()
export class EngineLifecycleService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(EngineLifecycleService.name);

  constructor(
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    @Inject(REFERENCE_QUOTE_SOURCE)
    private readonly referenceSource: IQuoteSource,
    @Inject(COMPARISON_QUOTE_SOURCE)
    private readonly comparisonSource: IQuoteSource,
    @Inject(ORDER_GATEWAY) private readonly gateway: IOrderGateway,
    private readonly scheduler: SchedulerService,
    private readonly marketData: MarketDataService,
    private readonly positionManager: PositionManagerService,
    private readonly statistics: StatisticsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    try {
      await Promise.all([
        this.referenceSource.connect(),
        this.comparisonSource.connect(),
        this.gateway.connect(),
      ]);
    } catch (error) {
      this.logger.error({
        message: 'Collaborator connection failed',
        module: 'core',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }

    this.statistics.startSession();

    let balance: GatewayBalance | null = null;
    try {
      balance = await this.gateway.balance();
    } catch (error) {
      this.logger.warn({
        message: 'Initial balance read failed',
        module: 'core',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    this.logger.log({
      message: 'Engine startup complete',
      module: 'core',
      configSummary: {
        symbols: this.config.symbols,
        gatewayMode: this.gateway.getMode(),
        minSpreadPercent: this.config.minSpreadPercent,
        targetSpreadPercent: this.config.targetSpreadPercent,
        tickIntervalMs: this.config.tickIntervalMs,
        maxPositions: this.config.risk.maxPositions,
        leverage: this.config.risk.leverage,
        sizing: this.config.risk.sizing.type,
        environment: process.env.NODE_ENV || 'development',
      },
      balance,
    });

    this.scheduler.start();
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    await withCorrelationId(async () => {
      this.logger.log({
        message: 'Graceful shutdown initiated',
        module: 'core',
        correlationId: getCorrelationId(),
        signal: signal || 'UNKNOWN',
      });

      try {
        // A tick still in flight may finish its exits but opens nothing new.
        this.positionManager.stopAcceptingEntries();
        this.scheduler.stop();
        await this.scheduler.waitForIdle();

        const symbols = this.positionManager
          .getOpenPositions()
          .map((p) => p.symbol);
        if (symbols.length > 0) {
          const referenceQuotes =
            await this.marketData.fetchReferenceQuotes(symbols);
          await this.positionManager.closeAllPositions(referenceQuotes);
        }

        const snapshot = this.statistics.getSnapshot();
        const openPositionsRemaining =
          this.positionManager.getOpenPositionCount();
        this.logger.log({
          message: 'Session summary',
          module: 'core',
          correlationId: getCorrelationId(),
          data: {
            totalTrades: snapshot.totalTrades,
            winningTrades: snapshot.winningTrades,
            winRate: snapshot.winRate,
            totalPnl: snapshot.totalPnl.toString(),
            opportunitiesDetected: snapshot.opportunitiesDetected,
            openPositionsRemaining,
          },
        });
        // Awaited so the session report lands before the process exits.
        await this.eventEmitter.emitAsync(
          EVENT_NAMES.SESSION_SUMMARY,
          new SessionSummaryEvent(
            snapshot,
            new Date(),
            openPositionsRemaining,
            getCorrelationId(),
          ),
        );
      } catch (error) {
        this.logger.error({
          message: 'Error during shutdown',
          module: 'core',
          correlationId: getCorrelationId(),
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }

      await this.disconnectAll();

      this.logger.log({
        message: 'Shutdown complete',
        module: 'core',
        correlationId: getCorrelationId(),
      });
    });
  }

  private async disconnectAll(): Promise<void> {
    const results = await Promise.allSettled([
      this.referenceSource.disconnect(),
      this.comparisonSource.disconnect(),
      this.gateway.disconnect(),
    ]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn({
          message: 'Collaborator disconnect failed',
          module: 'core',
          correlationId: getCorrelationId(),
          error:
            result.reason instanceof Error
              ? result.reason.message
              : 'Unknown error',
        });
      }
    }
  }
}
