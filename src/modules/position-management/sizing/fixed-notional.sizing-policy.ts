import Decimal from 'decimal.js';
import {
  ISizingPolicy,
  SizingContext,
} from '../../../common/interfaces/sizing-policy.interface';
import { FinancialDecimal } from '../../../common/utils/financial-math';

/** size = notionalUsd / referencePrice */
export class FixedNotionalSizingPolicy implements ISizingPolicy {
  readonly name = 'fixed_notional';
  private readonly notionalUsd: Decimal;

  constructor(notionalUsd: number) {
    this.notionalUsd = new FinancialDecimal(notionalUsd);
  }

  computeSize({ referencePrice }: SizingContext): Decimal {
    if (referencePrice.lte(0)) {
      return new FinancialDecimal(0);
    }
    return this.notionalUsd.div(referencePrice);
  }
}
