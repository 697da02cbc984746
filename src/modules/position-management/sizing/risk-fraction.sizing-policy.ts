import Decimal from 'decimal.js';
import {
  ISizingPolicy,
  SizingContext,
} from '../../../common/interfaces/sizing-policy.interface';
import { FinancialDecimal } from '../../../common/utils/financial-math';

/** size = min(maxNotionalUsd, freeBalance * riskFraction) / referencePrice */
export class RiskFractionSizingPolicy implements ISizingPolicy {
  readonly name = 'risk_fraction';
  private readonly riskFraction: Decimal;
  private readonly maxNotionalUsd: Decimal;

  constructor(riskFraction: number, maxNotionalUsd: number) {
    this.riskFraction = new FinancialDecimal(riskFraction);
    this.maxNotionalUsd = new FinancialDecimal(maxNotionalUsd);
  }

  computeSize({ referencePrice, freeBalanceUsd }: SizingContext): Decimal {
    if (referencePrice.lte(0) || freeBalanceUsd.lte(0)) {
      return new FinancialDecimal(0);
    }
    const notional = Decimal.min(
      this.maxNotionalUsd,
      freeBalanceUsd.mul(this.riskFraction),
    );
    return notional.div(referencePrice);
  }
}
