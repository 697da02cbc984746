import { SizingPolicyConfig } from '../../../common/config/engine-config.type';
import { ISizingPolicy } from '../../../common/interfaces/sizing-policy.interface';
import { FixedNotionalSizingPolicy } from './fixed-notional.sizing-policy';
import { RiskFractionSizingPolicy } from './risk-fraction.sizing-policy';

export function createSizingPolicy(config: SizingPolicyConfig): ISizingPolicy {
  switch (config.type) {
    case 'fixed_notional':
      return new FixedNotionalSizingPolicy(config.notionalUsd);
    case 'risk_fraction':
      return new RiskFractionSizingPolicy(
        config.riskFraction,
        config.maxNotionalUsd,
      );
  }
}
