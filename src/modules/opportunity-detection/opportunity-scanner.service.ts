import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { Opportunity } from '../../common/types/opportunity.type';
import { QuoteMap } from '../../common/types/quote.type';
import {
  FinancialDecimal,
  FinancialMath,
  isQuoteFresh,
} from '../../common/utils';
import { getCorrelationId } from '../../common/services/correlation-context';
import { ScanResult } from './types';

/**
 * Turns one tick's pair of quote maps into entry candidates.
 * No position awareness and no state: the same input always yields the
 * same opportunities.
 */
@Injectable()
export class OpportunityScannerService {
  private readonly logger = new Logger(OpportunityScannerService.name);
  private readonly minSpreadPercent: Decimal;

  constructor(@Inject(ENGINE_CONFIG) private readonly config: EngineConfig) {
    this.minSpreadPercent = new FinancialDecimal(config.minSpreadPercent);
  }

  scan(
    referenceQuotes: QuoteMap,
    comparisonQuotes: QuoteMap,
    symbols: readonly string[] = this.config.symbols,
    now: Date = new Date(),
  ): ScanResult {
    const startTime = Date.now();
    const opportunities: Opportunity[] = [];
    let symbolsEvaluated = 0;
    let symbolsSkipped = 0;

    for (const symbol of symbols) {
      const reference = referenceQuotes.get(symbol);
      const comparison = comparisonQuotes.get(symbol);

      if (
        !isQuoteFresh(reference, now, this.config.maxQuoteAgeMs) ||
        !isQuoteFresh(comparison, now, this.config.maxQuoteAgeMs)
      ) {
        this.logger.debug({
          message: 'Skipping symbol: quote missing or stale',
          module: 'opportunity-detection',
          correlationId: getCorrelationId(),
          data: {
            symbol,
            hasReference: reference !== undefined,
            hasComparison: comparison !== undefined,
          },
        });
        symbolsSkipped++;
        continue;
      }

      symbolsEvaluated++;
      const referencePrice = new FinancialDecimal(reference.price);
      const comparisonPrice = new FinancialDecimal(comparison.price);
      const spreadPercent = FinancialMath.calculateSpreadPercent(
        referencePrice,
        comparisonPrice,
      );

      if (!FinancialMath.isAboveThreshold(spreadPercent, this.minSpreadPercent)) {
        continue;
      }

      opportunities.push({
        symbol,
        referencePrice,
        comparisonPrice,
        spreadPercent,
        direction: FinancialMath.resolveDirection(referencePrice, comparisonPrice),
        detectedAt: now,
      });
    }

    const cycleDurationMs = Date.now() - startTime;

    this.logger.debug({
      message: 'Scan complete',
      module: 'opportunity-detection',
      correlationId: getCorrelationId(),
      data: {
        totalSymbols: symbols.length,
        evaluated: symbolsEvaluated,
        skipped: symbolsSkipped,
        opportunities: opportunities.length,
        durationMs: cycleDurationMs,
      },
    });

    return { opportunities, symbolsEvaluated, symbolsSkipped, cycleDurationMs };
  }
}
