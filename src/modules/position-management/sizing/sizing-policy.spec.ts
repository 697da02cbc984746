import { describe, it, expect } from 'vitest';
import { FixedNotionalSizingPolicy } from './fixed-notional.sizing-policy';
import { RiskFractionSizingPolicy } from './risk-fraction.sizing-policy';
import { createSizingPolicy } from './sizing-policy.factory';
import { FinancialDecimal } from '../../../common/utils/financial-math';

const ctx = (referencePrice: number, freeBalanceUsd: number) => ({
  symbol: 'BTC/USDT',
  referencePrice: new FinancialDecimal(referencePrice),
  freeBalanceUsd: new FinancialDecimal(freeBalanceUsd),
});

describe('FixedNotionalSizingPolicy', () => {
  it('should divide the notional by the reference price', () => {
    const policy = new FixedNotionalSizingPolicy(5.1);

    expect(policy.computeSize(ctx(2, 1000)).toString()).toBe('2.55');
  });

  it('should ignore the free balance', () => {
    const policy = new FixedNotionalSizingPolicy(100);

    expect(policy.computeSize(ctx(50, 1)).toString()).toBe('2');
  });
});

describe('RiskFractionSizingPolicy', () => {
  it('should size from a fraction of free balance', () => {
    const policy = new RiskFractionSizingPolicy(0.1, 500);

    // min(500, 1000 * 0.1) / 20 = 5
    expect(policy.computeSize(ctx(20, 1000)).toString()).toBe('5');
  });

  it('should cap the notional at maxNotionalUsd', () => {
    const policy = new RiskFractionSizingPolicy(0.5, 200);

    // min(200, 1000 * 0.5) / 100 = 2
    expect(policy.computeSize(ctx(100, 1000)).toString()).toBe('2');
  });

  it('should return zero with no free balance', () => {
    const policy = new RiskFractionSizingPolicy(0.1, 500);

    expect(policy.computeSize(ctx(100, 0)).isZero()).toBe(true);
  });
});

describe('createSizingPolicy', () => {
  it('should build the configured strategy', () => {
    expect(
      createSizingPolicy({ type: 'fixed_notional', notionalUsd: 10 }).name,
    ).toBe('fixed_notional');
    expect(
      createSizingPolicy({
        type: 'risk_fraction',
        riskFraction: 0.2,
        maxNotionalUsd: 50,
      }),
    ).toBeInstanceOf(RiskFractionSizingPolicy);
  });
});
