import { GatewayMode } from '../types/venue.type';

export type SizingPolicyConfig =
  | { type: 'fixed_notional'; notionalUsd: number }
  | { type: 'risk_fraction'; riskFraction: number; maxNotionalUsd: number };

export interface RiskLimits {
  maxPositions: number;
  sizing: SizingPolicyConfig;
  leverage: number;
  stopLossPercent: number;
  takeProfitPercent: number;
  maxHoldDurationMs: number;
  /** Flat per-side fee rate, e.g. 0.0002 = 0.02% */
  feeRate: number;
  minFreeBalanceUsd: number;
  /** Null disables the daily loss stop. */
  maxDailyLossUsd: number | null;
}

export interface PaperGatewayConfig {
  startingBalanceUsd: number;
  slippageBps: number;
}

export interface QuoteSourceConfig {
  referenceBaseUrl: string;
  comparisonBaseUrl: string;
  requestTimeoutMs: number;
  comparisonCacheTtlMs: number;
  comparisonMaxConcurrency: number;
  /** Pairs below either floor are ignored when pricing the comparison venue. */
  comparisonMinLiquidityUsd: number;
  comparisonMinVolumeUsd: number;
  /** Symbol → search term, for tokens whose ticker is ambiguous on the DEX. */
  comparisonSearchAliases: Readonly<Record<string, string>>;
}

/**
 * Validated, frozen engine configuration. Built once at startup and injected
 * via ENGINE_CONFIG; never mutated for the lifetime of the run.
 */
export interface EngineConfig {
  symbols: readonly string[];
  minSpreadPercent: number;
  targetSpreadPercent: number;
  tickIntervalMs: number;
  /** Upper bound for one source's quote fetch within a tick. */
  quoteTimeoutMs: number;
  maxQuoteAgeMs: number;
  gatewayMode: GatewayMode;
  risk: Readonly<RiskLimits>;
  paper: Readonly<PaperGatewayConfig>;
  quoteSources: Readonly<QuoteSourceConfig>;
  reportDir: string;
}
