import Decimal from 'decimal.js';

export interface SizingContext {
  symbol: string;
  referencePrice: Decimal;
  freeBalanceUsd: Decimal;
}

/** Converts an entry signal into a base-asset quantity. */
export interface ISizingPolicy {
  readonly name: string;
  computeSize(context: SizingContext): Decimal;
}
