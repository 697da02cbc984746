import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { EXECUTION_ERROR_CODES } from '../../common/errors/execution-error-codes';
import { SYSTEM_HEALTH_ERROR_CODES } from '../../common/errors/system-health-error';
import {
  EVENT_NAMES,
  PositionClosedEvent,
  PositionCloseFailedEvent,
  PositionOpenedEvent,
  PositionOpenFailedEvent,
} from '../../common/events';
import { IOrderGateway, ISizingPolicy } from '../../common/interfaces';
import { getCorrelationId } from '../../common/services/correlation-context';
import { Opportunity } from '../../common/types/opportunity.type';
import {
  ClosedTrade,
  ExitReason,
  Position,
  PositionStatus,
} from '../../common/types/position.type';
import { Quote, QuoteMap } from '../../common/types/quote.type';
import { FinancialDecimal, FinancialMath } from '../../common/utils';
import { ORDER_GATEWAY } from '../../connectors/connector.constants';
import { StatisticsService } from '../statistics/statistics.service';
import { ExitEvaluatorService } from './exit-evaluator.service';
import { SIZING_POLICY } from './sizing/sizing-policy.constants';
import {
  CloseResult,
  EntryDecision,
  EntrySkipReason,
  ShutdownCloseReport,
} from './types';

/**
 * Sole owner of the position map and the only caller of gateway open/close.
 * At most one tracked position per symbol; a symbol with a gateway call in
 * flight is skipped rather than queued.
 */
@Injectable()
export class PositionManagerService {
  private readonly logger = new Logger(PositionManagerService.name);
  private readonly positions = new Map<string, Position>();
  private readonly inFlight = new Set<string>();
  private acceptingEntries = true;

  constructor(
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    @Inject(ORDER_GATEWAY) private readonly gateway: IOrderGateway,
    @Inject(SIZING_POLICY) private readonly sizingPolicy: ISizingPolicy,
    private readonly exitEvaluator: ExitEvaluatorService,
    private readonly statistics: StatisticsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async considerEntry(opportunity: Opportunity): Promise<EntryDecision> {
    const { symbol } = opportunity;

    if (!this.acceptingEntries) {
      return this.skip(symbol, 'shutting_down');
    }
    if (this.inFlight.has(symbol)) {
      return this.skip(symbol, 'in_flight');
    }
    if (this.positions.has(symbol)) {
      return this.skip(symbol, 'position_exists');
    }

    const { risk } = this.config;
    if (this.positions.size >= risk.maxPositions) {
      return this.skip(symbol, 'max_positions', {
        openPositions: this.positions.size,
        maxPositions: risk.maxPositions,
      });
    }

    if (
      risk.maxDailyLossUsd !== null &&
      this.statistics.getDailyPnl().lte(-risk.maxDailyLossUsd)
    ) {
      return this.skip(symbol, 'daily_loss_limit', {
        dailyPnl: this.statistics.getDailyPnl().toString(),
        maxDailyLossUsd: risk.maxDailyLossUsd,
      });
    }

    this.inFlight.add(symbol);
    try {
      return await this.openPosition(opportunity);
    } finally {
      this.inFlight.delete(symbol);
    }
  }

  /**
   * Refuses every later entry for the rest of the run. Called when shutdown
   * starts, so a tick still in flight cannot open exposure after the final
   * close-out.
   */
  stopAcceptingEntries(): void {
    if (!this.acceptingEntries) return;
    this.acceptingEntries = false;
    this.logger.log({
      message: 'Entries disabled for shutdown',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: { openPositions: this.positions.size },
    });
  }

  /** Closes the position when the evaluator says so; otherwise a no-op. */
  async evaluatePosition(
    position: Position,
    referenceQuote: Quote | undefined,
    comparisonQuote: Quote | undefined,
    now: Date,
  ): Promise<CloseResult | null> {
    const decision = this.exitEvaluator.evaluate(
      position,
      referenceQuote,
      comparisonQuote,
      now,
    );
    if (!decision.triggered) {
      return null;
    }

    const logPayload = {
      message: 'Exit triggered',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: {
        symbol: position.symbol,
        positionId: position.positionId,
        reason: decision.reason,
        currentSpread: decision.currentSpread?.toString() ?? null,
      },
    };
    if (decision.reason === 'quote_unavailable') {
      this.logger.warn({
        ...logPayload,
        code: SYSTEM_HEALTH_ERROR_CODES.QUOTE_UNAVAILABLE,
      });
    } else {
      this.logger.log(logPayload);
    }

    return this.closePosition(position.symbol, decision.reason, referenceQuote);
  }

  async evaluateOpenPositions(
    referenceQuotes: QuoteMap,
    comparisonQuotes: QuoteMap,
    now: Date,
  ): Promise<CloseResult[]> {
    const results: CloseResult[] = [];
    const snapshot = [...this.positions.values()].filter(
      (p) => p.status === PositionStatus.OPEN,
    );

    for (const position of snapshot) {
      try {
        const result = await this.evaluatePosition(
          position,
          referenceQuotes.get(position.symbol),
          comparisonQuotes.get(position.symbol),
          now,
        );
        if (result) {
          results.push(result);
        }
      } catch (error) {
        this.logger.error({
          message: 'Position evaluation failed',
          module: 'position-management',
          correlationId: getCorrelationId(),
          data: {
            symbol: position.symbol,
            error: error instanceof Error ? error.message : 'Unknown error',
          },
        });
      }
    }

    return results;
  }

  async closePosition(
    symbol: string,
    reason: ExitReason,
    referenceQuote?: Quote,
  ): Promise<CloseResult> {
    const position = this.positions.get(symbol);
    if (!position) {
      return { closed: false, symbol, reason: 'no tracked position' };
    }
    if (this.inFlight.has(symbol)) {
      return { closed: false, symbol, reason: 'close already in flight' };
    }

    this.inFlight.add(symbol);
    position.status = PositionStatus.CLOSING;
    try {
      let fillPrice: number | null;
      try {
        const result = await this.gateway.close(symbol);
        if (result.status === 'rejected') {
          return this.handleCloseFailure(
            position,
            reason,
            result.reason ?? 'close rejected by gateway',
          );
        }
        fillPrice = result.fillPrice;
      } catch (error) {
        return this.handleCloseFailure(
          position,
          reason,
          error instanceof Error ? error.message : 'Unknown error',
        );
      }

      const trade = this.settle(position, reason, fillPrice, referenceQuote);
      // Awaited: report writers must finish before a shutdown close returns.
      await this.eventEmitter.emitAsync(
        EVENT_NAMES.POSITION_CLOSED,
        new PositionClosedEvent(trade, getCorrelationId()),
      );
      return { closed: true, trade };
    } finally {
      this.inFlight.delete(symbol);
    }
  }

  async closeAllPositions(
    referenceQuotes: QuoteMap,
  ): Promise<ShutdownCloseReport> {
    const report: ShutdownCloseReport = { closed: [], failed: [] };

    for (const symbol of [...this.positions.keys()]) {
      const result = await this.closePosition(
        symbol,
        'shutdown',
        referenceQuotes.get(symbol),
      );
      if (result.closed) {
        report.closed.push(result.trade);
      } else {
        report.failed.push(symbol);
      }
    }

    this.logger.log({
      message: 'Shutdown close complete',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: { closed: report.closed.length, failed: report.failed },
    });

    return report;
  }

  getOpenPositions(): Position[] {
    return [...this.positions.values()].map((p) => ({ ...p }));
  }

  getPosition(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  getOpenPositionCount(): number {
    return this.positions.size;
  }

  private async openPosition(opportunity: Opportunity): Promise<EntryDecision> {
    const { symbol, direction, referencePrice } = opportunity;
    const { risk } = this.config;

    let freeBalance: Decimal;
    try {
      const balance = await this.gateway.balance();
      freeBalance = new FinancialDecimal(balance.free);
    } catch (error) {
      return this.skip(symbol, 'insufficient_balance', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
    if (freeBalance.lt(risk.minFreeBalanceUsd)) {
      return this.skip(symbol, 'insufficient_balance', {
        free: freeBalance.toString(),
        minFreeBalanceUsd: risk.minFreeBalanceUsd,
      });
    }

    const size = this.sizingPolicy.computeSize({
      symbol,
      referencePrice,
      freeBalanceUsd: freeBalance,
    });
    if (size.lte(0)) {
      return this.skip(symbol, 'size_not_positive', {
        size: size.toString(),
        policy: this.sizingPolicy.name,
      });
    }

    const isPaper = this.gateway.getMode() === 'test';
    let orderId: string;
    let fillPrice: number | null;
    try {
      const result = await this.gateway.open(symbol, direction, size.toNumber());
      if (result.status === 'rejected') {
        return this.handleOpenFailure(
          opportunity,
          size,
          result.reason ?? 'open rejected by gateway',
          isPaper,
        );
      }
      orderId = result.orderId;
      fillPrice = result.fillPrice;
    } catch (error) {
      return this.handleOpenFailure(
        opportunity,
        size,
        error instanceof Error ? error.message : 'Unknown error',
        isPaper,
      );
    }

    const entryPrice =
      fillPrice !== null ? new FinancialDecimal(fillPrice) : referencePrice;
    const { stopLossPrice, takeProfitPrice } = FinancialMath.calculateRiskLevels(
      direction,
      entryPrice,
      risk.stopLossPercent,
      risk.takeProfitPercent,
    );

    const position: Position = {
      positionId: uuidv4(),
      orderId,
      symbol,
      side: direction,
      size,
      entryPrice,
      entrySpread: opportunity.spreadPercent,
      entryTime: new Date(),
      targetSpread: new FinancialDecimal(this.config.targetSpreadPercent),
      stopLossPrice,
      takeProfitPrice,
      status: PositionStatus.OPEN,
      isPaper,
    };
    this.positions.set(symbol, position);
    this.statistics.recordOpen();

    this.logger.log({
      message: 'Position opened',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: {
        symbol,
        positionId: position.positionId,
        side: direction,
        size: size.toString(),
        entryPrice: entryPrice.toString(),
        stopLossPrice: stopLossPrice.toString(),
        takeProfitPrice: takeProfitPrice.toString(),
        isPaper,
      },
    });

    await this.eventEmitter.emitAsync(
      EVENT_NAMES.POSITION_OPENED,
      new PositionOpenedEvent({ ...position }, getCorrelationId()),
    );

    return {
      symbol,
      opened: true,
      reason: 'opened',
      positionId: position.positionId,
    };
  }

  private settle(
    position: Position,
    reason: ExitReason,
    fillPrice: number | null,
    referenceQuote: Quote | undefined,
  ): ClosedTrade {
    let exitPrice: Decimal;
    if (fillPrice !== null) {
      exitPrice = new FinancialDecimal(fillPrice);
    } else if (referenceQuote) {
      exitPrice = new FinancialDecimal(referenceQuote.price);
    } else {
      exitPrice = position.entryPrice;
      this.logger.warn({
        message: 'No exit price available, closing flat at entry price',
        module: 'position-management',
        correlationId: getCorrelationId(),
        data: { symbol: position.symbol, positionId: position.positionId },
      });
    }

    const pnl = FinancialMath.calculateRealizedPnl({
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice,
      size: position.size,
      leverage: this.config.risk.leverage,
      feeRate: this.config.risk.feeRate,
    });

    const trade: ClosedTrade = {
      positionId: position.positionId,
      symbol: position.symbol,
      side: position.side,
      size: position.size,
      entryPrice: position.entryPrice,
      exitPrice,
      grossPnl: pnl.grossPnl,
      fees: pnl.fees,
      realizedPnl: pnl.realizedPnl,
      exitReason: reason,
      openedAt: position.entryTime,
      closedAt: new Date(),
      isPaper: position.isPaper,
    };

    position.status = PositionStatus.CLOSED;
    this.positions.delete(position.symbol);
    this.statistics.recordClose(pnl.realizedPnl);

    this.logger.log({
      message: 'Position closed',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: {
        symbol: trade.symbol,
        positionId: trade.positionId,
        exitReason: reason,
        exitPrice: exitPrice.toString(),
        realizedPnl: trade.realizedPnl.toString(),
      },
    });

    return trade;
  }

  private handleOpenFailure(
    opportunity: Opportunity,
    size: Decimal,
    reason: string,
    isPaper: boolean,
  ): EntryDecision {
    this.logger.error({
      message: 'Position open failed',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: {
        symbol: opportunity.symbol,
        side: opportunity.direction,
        size: size.toString(),
        code: EXECUTION_ERROR_CODES.GATEWAY_REJECTED,
        reason,
      },
    });

    this.eventEmitter.emit(
      EVENT_NAMES.POSITION_OPEN_FAILED,
      new PositionOpenFailedEvent(
        opportunity.symbol,
        opportunity.direction,
        size,
        EXECUTION_ERROR_CODES.GATEWAY_REJECTED,
        reason,
        getCorrelationId(),
        isPaper,
      ),
    );

    return {
      symbol: opportunity.symbol,
      opened: false,
      reason: 'gateway_rejected',
    };
  }

  private handleCloseFailure(
    position: Position,
    exitReason: ExitReason,
    reason: string,
  ): CloseResult {
    position.status = PositionStatus.OPEN;

    this.logger.error({
      message: 'Position close failed, will retry next tick',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: {
        symbol: position.symbol,
        positionId: position.positionId,
        exitReason,
        code: EXECUTION_ERROR_CODES.CLOSE_FAILED,
        reason,
      },
    });

    this.eventEmitter.emit(
      EVENT_NAMES.POSITION_CLOSE_FAILED,
      new PositionCloseFailedEvent(
        position.positionId,
        position.symbol,
        exitReason,
        EXECUTION_ERROR_CODES.CLOSE_FAILED,
        reason,
        getCorrelationId(),
        position.isPaper,
      ),
    );

    return { closed: false, symbol: position.symbol, reason };
  }

  private skip(
    symbol: string,
    reason: EntrySkipReason,
    data: Record<string, unknown> = {},
  ): EntryDecision {
    this.logger.debug({
      message: 'Entry skipped',
      module: 'position-management',
      correlationId: getCorrelationId(),
      data: { symbol, reason, ...data },
    });
    return { symbol, opened: false, reason };
  }
}
