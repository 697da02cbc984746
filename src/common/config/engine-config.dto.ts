import {
  ArrayNotEmpty,
  ArrayUnique,
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export const GATEWAY_MODES = ['test', 'live'] as const;
export const SIZING_POLICY_TYPES = ['fixed_notional', 'risk_fraction'] as const;

export class SizingConfigDto {
  @IsIn(SIZING_POLICY_TYPES)
  type!: (typeof SIZING_POLICY_TYPES)[number];

  @ValidateIf((o: SizingConfigDto) => o.type === 'fixed_notional')
  @IsNumber()
  @IsPositive()
  notionalUsd?: number;

  @ValidateIf((o: SizingConfigDto) => o.type === 'risk_fraction')
  @IsNumber()
  @IsPositive()
  @Max(1)
  riskFraction?: number;

  @ValidateIf((o: SizingConfigDto) => o.type === 'risk_fraction')
  @IsNumber()
  @IsPositive()
  maxNotionalUsd?: number;
}

export class RiskConfigDto {
  @IsInt()
  @Min(1)
  maxPositions!: number;

  @ValidateNested()
  @Type(() => SizingConfigDto)
  sizing!: SizingConfigDto;

  @IsInt()
  @Min(1)
  leverage!: number;

  @IsNumber()
  @IsPositive()
  @Max(100)
  stopLossPercent!: number;

  @IsNumber()
  @IsPositive()
  @Max(100)
  takeProfitPercent!: number;

  @IsInt()
  @Min(1)
  maxHoldDurationMs!: number;

  @IsNumber()
  @Min(0)
  @Max(0.1)
  feeRate!: number;

  @IsNumber()
  @Min(0)
  minFreeBalanceUsd!: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  maxDailyLossUsd?: number | null;
}

export class PaperGatewayConfigDto {
  @IsNumber()
  @IsPositive()
  startingBalanceUsd!: number;

  @IsNumber()
  @Min(0)
  @Max(1000)
  slippageBps!: number;
}

export class GatewayConfigDto {
  @IsIn(GATEWAY_MODES)
  mode!: (typeof GATEWAY_MODES)[number];

  @ValidateNested()
  @Type(() => PaperGatewayConfigDto)
  paper!: PaperGatewayConfigDto;
}

export class QuoteSourcesConfigDto {
  @IsUrl({ require_tld: false })
  referenceBaseUrl!: string;

  @IsUrl({ require_tld: false })
  comparisonBaseUrl!: string;

  @IsInt()
  @Min(1)
  requestTimeoutMs!: number;

  @IsInt()
  @Min(0)
  comparisonCacheTtlMs!: number;

  @IsInt()
  @Min(1)
  comparisonMaxConcurrency!: number;

  @IsNumber()
  @Min(0)
  comparisonMinLiquidityUsd!: number;

  @IsNumber()
  @Min(0)
  comparisonMinVolumeUsd!: number;

  @IsOptional()
  @IsObject()
  comparisonSearchAliases?: Record<string, string>;
}

export class EngineConfigDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayUnique()
  @IsString({ each: true })
  @Matches(/^[A-Z0-9]+\/[A-Z0-9]+$/, {
    each: true,
    message: 'each symbol must look like BASE/QUOTE',
  })
  symbols!: string[];

  @IsNumber()
  @IsPositive()
  minSpreadPercent!: number;

  @IsNumber()
  @IsPositive()
  targetSpreadPercent!: number;

  @IsInt()
  @Min(100)
  tickIntervalMs!: number;

  @IsInt()
  @Min(1)
  quoteTimeoutMs!: number;

  @IsInt()
  @Min(1)
  maxQuoteAgeMs!: number;

  @ValidateNested()
  @Type(() => GatewayConfigDto)
  gateway!: GatewayConfigDto;

  @ValidateNested()
  @Type(() => RiskConfigDto)
  risk!: RiskConfigDto;

  @ValidateNested()
  @Type(() => QuoteSourcesConfigDto)
  quoteSources!: QuoteSourcesConfigDto;

  @IsString()
  reportDir!: string;

  /**
   * Rules that span fields, run after class-validator decorators pass.
   */
  static validateCrossFieldRules(config: EngineConfigDto): string[] {
    const errors: string[] = [];

    if (config.targetSpreadPercent >= config.minSpreadPercent) {
      errors.push(
        `targetSpreadPercent (${config.targetSpreadPercent}) must be lower than minSpreadPercent (${config.minSpreadPercent})`,
      );
    }

    // A cached quote is as old as the cache entry on the tick that reads it.
    if (config.quoteSources.comparisonCacheTtlMs >= config.maxQuoteAgeMs) {
      errors.push(
        `quoteSources.comparisonCacheTtlMs (${config.quoteSources.comparisonCacheTtlMs}) must be lower than maxQuoteAgeMs (${config.maxQuoteAgeMs})`,
      );
    }

    if (config.gateway.mode === 'live') {
      errors.push(
        'gateway.mode "live" requires a venue trading client, which is not bundled; use "test"',
      );
    }

    const aliases = config.quoteSources.comparisonSearchAliases ?? {};
    for (const [symbol, alias] of Object.entries(aliases)) {
      if (typeof alias !== 'string' || alias.trim() === '') {
        errors.push(`comparisonSearchAliases.${symbol} must be a non-empty string`);
      }
    }

    return errors;
  }
}
