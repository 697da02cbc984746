import Decimal from 'decimal.js';

export type TradeDirection = 'long' | 'short';

/**
 * A detected, not-yet-acted-upon spread. Never outlives the tick that found it.
 * Decimal fields are FinancialDecimal instances at runtime.
 */
export interface Opportunity {
  symbol: string;
  referencePrice: Decimal;
  comparisonPrice: Decimal;
  spreadPercent: Decimal;
  direction: TradeDirection;
  detectedAt: Date;
}
