import { Inject, Injectable } from '@nestjs/common';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { Position } from '../../common/types/position.type';
import { Quote } from '../../common/types/quote.type';
import {
  FinancialDecimal,
  FinancialMath,
  isQuoteFresh,
} from '../../common/utils';
import { ExitDecision } from './types';

/**
 * Decides whether an open position must close. Pure: reads only its inputs.
 *
 * Rules in priority order, first match wins:
 * 1. quote_unavailable: either quote missing or older than maxQuoteAgeMs
 * 2. spread_converged: current spread <= position target spread
 * 3. stop_loss: long ref <= stop, short ref >= stop
 * 4. take_profit: long ref >= take, short ref <= take
 * 5. max_hold_time: held longer than maxHoldDurationMs
 */
@Injectable()
export class ExitEvaluatorService {
  constructor(@Inject(ENGINE_CONFIG) private readonly config: EngineConfig) {}

  evaluate(
    position: Position,
    referenceQuote: Quote | undefined,
    comparisonQuote: Quote | undefined,
    now: Date,
  ): ExitDecision {
    if (
      !isQuoteFresh(referenceQuote, now, this.config.maxQuoteAgeMs) ||
      !isQuoteFresh(comparisonQuote, now, this.config.maxQuoteAgeMs)
    ) {
      return {
        triggered: true,
        reason: 'quote_unavailable',
        currentSpread: null,
      };
    }

    const referencePrice = new FinancialDecimal(referenceQuote.price);
    const currentSpread = FinancialMath.calculateSpreadPercent(
      referencePrice,
      new FinancialDecimal(comparisonQuote.price),
    );

    if (currentSpread.lte(position.targetSpread)) {
      return { triggered: true, reason: 'spread_converged', currentSpread };
    }

    const isLong = position.side === 'long';

    const stopHit = isLong
      ? referencePrice.lte(position.stopLossPrice)
      : referencePrice.gte(position.stopLossPrice);
    if (stopHit) {
      return { triggered: true, reason: 'stop_loss', currentSpread };
    }

    const takeHit = isLong
      ? referencePrice.gte(position.takeProfitPrice)
      : referencePrice.lte(position.takeProfitPrice);
    if (takeHit) {
      return { triggered: true, reason: 'take_profit', currentSpread };
    }

    const heldMs = now.getTime() - position.entryTime.getTime();
    if (heldMs > this.config.risk.maxHoldDurationMs) {
      return { triggered: true, reason: 'max_hold_time', currentSpread };
    }

    return { triggered: false, currentSpread };
  }
}
