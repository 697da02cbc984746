import Decimal from 'decimal.js';
import { TradeDirection } from '../types/opportunity.type';

// Isolated Decimal constructor configured for financial precision.
// Uses Decimal.clone() to avoid mutating the global Decimal settings,
// so other modules can safely import decimal.js with their own config.
export const FinancialDecimal = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 20,
});

export interface RiskLevels {
  stopLossPrice: Decimal;
  takeProfitPrice: Decimal;
}

export interface RealizedPnlInput {
  side: TradeDirection;
  entryPrice: Decimal;
  exitPrice: Decimal;
  size: Decimal;
  leverage: number;
  feeRate: number;
}

export interface RealizedPnl {
  grossPnl: Decimal;
  fees: Decimal;
  realizedPnl: Decimal;
}

/**
 * Pure financial math for spread detection and position accounting.
 * All methods use decimal.js, never native `number`, for money.
 */
export class FinancialMath {
  /**
   * Percentage spread between the two venues.
   * Formula: |referencePrice - comparisonPrice| / referencePrice * 100
   *
   * The denominator is always the reference venue's price, never a mid price.
   */
  static calculateSpreadPercent(
    referencePrice: Decimal,
    comparisonPrice: Decimal,
  ): Decimal {
    FinancialMath.validatePositive(referencePrice, 'referencePrice');
    FinancialMath.validatePositive(comparisonPrice, 'comparisonPrice');

    return referencePrice
      .minus(comparisonPrice)
      .abs()
      .div(referencePrice)
      .mul(100);
  }

  /** Long on the reference venue when it is the cheaper side. */
  static resolveDirection(
    referencePrice: Decimal,
    comparisonPrice: Decimal,
  ): TradeDirection {
    return referencePrice.lessThan(comparisonPrice) ? 'long' : 'short';
  }

  static isAboveThreshold(spreadPercent: Decimal, threshold: Decimal): boolean {
    FinancialMath.validateDecimalInput(spreadPercent, 'spreadPercent');
    FinancialMath.validateDecimalInput(threshold, 'threshold');

    return spreadPercent.gte(threshold);
  }

  /**
   * Stop-loss and take-profit prices relative to the entry.
   * long: stop below entry, take above. short: mirrored.
   */
  static calculateRiskLevels(
    side: TradeDirection,
    entryPrice: Decimal,
    stopLossPercent: number,
    takeProfitPercent: number,
  ): RiskLevels {
    FinancialMath.validatePositive(entryPrice, 'entryPrice');
    FinancialMath.validateNumberInput(stopLossPercent, 'stopLossPercent');
    FinancialMath.validateNumberInput(takeProfitPercent, 'takeProfitPercent');

    const stopFraction = new FinancialDecimal(stopLossPercent).div(100);
    const takeFraction = new FinancialDecimal(takeProfitPercent).div(100);
    const one = new FinancialDecimal(1);

    if (side === 'long') {
      return {
        stopLossPrice: entryPrice.mul(one.minus(stopFraction)),
        takeProfitPrice: entryPrice.mul(one.plus(takeFraction)),
      };
    }
    return {
      stopLossPrice: entryPrice.mul(one.plus(stopFraction)),
      takeProfitPrice: entryPrice.mul(one.minus(takeFraction)),
    };
  }

  /**
   * Realized PnL of a closed position.
   *   gross = (exit - entry) * size * leverage   (long)
   *   gross = (entry - exit) * size * leverage   (short)
   *   fees  = entry * size * feeRate * 2         (round trip)
   */
  static calculateRealizedPnl(input: RealizedPnlInput): RealizedPnl {
    const { side, entryPrice, exitPrice, size, leverage, feeRate } = input;
    FinancialMath.validateDecimalInput(entryPrice, 'entryPrice');
    FinancialMath.validateDecimalInput(exitPrice, 'exitPrice');
    FinancialMath.validateDecimalInput(size, 'size');
    FinancialMath.validateNumberInput(leverage, 'leverage');
    FinancialMath.validateNumberInput(feeRate, 'feeRate');

    const priceDelta =
      side === 'long' ? exitPrice.minus(entryPrice) : entryPrice.minus(exitPrice);
    const grossPnl = priceDelta.mul(size).mul(leverage);
    const fees = entryPrice.mul(size).mul(feeRate).mul(2);

    return { grossPnl, fees, realizedPnl: grossPnl.minus(fees) };
  }

  private static validateDecimalInput(value: Decimal, name: string): void {
    if (value.isNaN()) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!value.isFinite()) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }

  private static validatePositive(value: Decimal, name: string): void {
    FinancialMath.validateDecimalInput(value, name);
    if (value.lte(0)) {
      throw new Error(`FinancialMath: ${name} must be greater than zero`);
    }
  }

  private static validateNumberInput(value: number, name: string): void {
    if (Number.isNaN(value)) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!Number.isFinite(value)) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }
}
