import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import { EngineConfig } from '../common/config/engine-config.type';
import { EVENT_NAMES, OpportunityIdentifiedEvent } from '../common/events';
import {
  getCorrelationId,
  withCorrelationId,
} from '../common/services/correlation-context';
import { MarketDataService } from '../modules/market-data/market-data.service';
import { OpportunityScannerService } from '../modules/opportunity-detection/opportunity-scanner.service';
import { PositionManagerService } from '../modules/position-management/position-manager.service';
import { StatisticsService } from '../modules/statistics/statistics.service';
import { TickResult, TickStageDurations } from './types';

/**
 * Runs one engine tick: fetch → scan → enter → exit → daily rollover.
 */
@Injectable()
export class TradingEngineService {
  private readonly logger = new Logger(TradingEngineService.name);

  constructor(
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    private readonly marketData: MarketDataService,
    private readonly scanner: OpportunityScannerService,
    private readonly positionManager: PositionManagerService,
    private readonly statistics: StatisticsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Never rejects: an unexpected failure is logged and reported in
   * `TickResult.error`, and the next tick runs as usual.
   *
   * @param nowOverride Evaluation clock for staleness, holds and rollover;
   *   defaults to the tick start. Quotes are stamped on receipt, so a slow
   *   venue never ages the other venue's quotes.
   */
  executeTick(nowOverride?: Date): Promise<TickResult> {
    return withCorrelationId(() => this.runTick(nowOverride));
  }

  private async runTick(nowOverride?: Date): Promise<TickResult> {
    const startedAt = new Date();
    const stageDurations: TickStageDurations = {
      fetchMs: 0,
      scanMs: 0,
      entryMs: 0,
      exitMs: 0,
    };
    const result: TickResult = {
      correlationId: getCorrelationId(),
      startedAt,
      durationMs: 0,
      stageDurations,
      referenceQuoteCount: 0,
      comparisonQuoteCount: 0,
      opportunitiesDetected: 0,
      entries: [],
      exits: [],
    };

    try {
      // Fetch both venues concurrently; a failed source comes back empty.
      let stageStart = Date.now();
      const quotes = await this.marketData.fetchQuotes(this.config.symbols);
      stageDurations.fetchMs = Date.now() - stageStart;
      result.referenceQuoteCount = quotes.reference.size;
      result.comparisonQuoteCount = quotes.comparison.size;
      const now = nowOverride ?? startedAt;

      stageStart = Date.now();
      const scan = this.scanner.scan(
        quotes.reference,
        quotes.comparison,
        this.config.symbols,
        now,
      );
      stageDurations.scanMs = Date.now() - stageStart;
      result.opportunitiesDetected = scan.opportunities.length;
      this.statistics.recordOpportunities(scan.opportunities.length);

      for (const opportunity of scan.opportunities) {
        this.eventEmitter.emit(
          EVENT_NAMES.OPPORTUNITY_IDENTIFIED,
          new OpportunityIdentifiedEvent(opportunity, getCorrelationId()),
        );
      }

      // Entries are sequential, in configured symbol order.
      stageStart = Date.now();
      for (const opportunity of scan.opportunities) {
        result.entries.push(
          await this.positionManager.considerEntry(opportunity),
        );
      }
      stageDurations.entryMs = Date.now() - stageStart;

      stageStart = Date.now();
      result.exits = await this.positionManager.evaluateOpenPositions(
        quotes.reference,
        quotes.comparison,
        now,
      );
      stageDurations.exitMs = Date.now() - stageStart;

      this.statistics.rollover(now);

      result.durationMs = Date.now() - startedAt.getTime();
      this.logger.log({
        message: 'Tick completed',
        module: 'core',
        correlationId: getCorrelationId(),
        data: {
          durationMs: result.durationMs,
          stageDurations,
          referenceQuotes: result.referenceQuoteCount,
          comparisonQuotes: result.comparisonQuoteCount,
          symbolsSkipped: scan.symbolsSkipped,
          opportunities: result.opportunitiesDetected,
          opened: result.entries.filter((e) => e.opened).length,
          closed: result.exits.filter((e) => e.closed).length,
          openPositions: this.positionManager.getOpenPositionCount(),
        },
      });
    } catch (error) {
      result.durationMs = Date.now() - startedAt.getTime();
      result.error = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({
        message: 'Tick failed',
        module: 'core',
        correlationId: getCorrelationId(),
        data: {
          durationMs: result.durationMs,
          stageDurations,
          error: result.error,
        },
      });
    }

    return result;
  }
}
