import { vi } from 'vitest';
import { EngineConfig, RiskLimits } from '../common/config/engine-config.type';
import { Quote, QuoteMap } from '../common/types/quote.type';
import { VenueRole } from '../common/types/venue.type';
import { Position, PositionStatus } from '../common/types/position.type';
import {
  FinancialDecimal,
  FinancialMath,
} from '../common/utils/financial-math';
import { Opportunity, TradeDirection } from '../common/types/opportunity.type';
import {
  CloseOrderResult,
  GatewayBalance,
  OpenOrderResult,
} from '../common/types/order.type';

type EngineConfigOverrides = Partial<Omit<EngineConfig, 'risk'>> & {
  risk?: Partial<RiskLimits>;
};

/**
 * EngineConfig with small, round defaults for unit tests.
 * Nested risk overrides are merged, everything else replaces.
 */
export const createTestEngineConfig = (
  overrides: EngineConfigOverrides = {},
): EngineConfig => {
  const { risk, ...rest } = overrides;
  return {
    symbols: ['BTC/USDT', 'ETH/USDT'],
    minSpreadPercent: 7.5,
    targetSpreadPercent: 1.5,
    tickIntervalMs: 1000,
    quoteTimeoutMs: 5000,
    maxQuoteAgeMs: 2000,
    gatewayMode: 'test',
    paper: { startingBalanceUsd: 1000, slippageBps: 0 },
    quoteSources: {
      referenceBaseUrl: 'http://reference.test',
      comparisonBaseUrl: 'http://comparison.test',
      requestTimeoutMs: 5000,
      comparisonCacheTtlMs: 1000,
      comparisonMaxConcurrency: 5,
      comparisonMinLiquidityUsd: 1000,
      comparisonMinVolumeUsd: 100,
      comparisonSearchAliases: {},
    },
    reportDir: 'data/test-reports',
    ...rest,
    risk: {
      maxPositions: 10,
      sizing: { type: 'fixed_notional', notionalUsd: 100 },
      leverage: 2,
      stopLossPercent: 50,
      takeProfitPercent: 20,
      maxHoldDurationMs: 3_600_000,
      feeRate: 0.0004,
      minFreeBalanceUsd: 10,
      maxDailyLossUsd: null,
      ...risk,
    },
  };
};

export const createQuote = (
  symbol: string,
  price: number,
  venue: VenueRole = VenueRole.REFERENCE,
  timestamp: Date = new Date(),
): Quote => ({ symbol, venue, price, timestamp, sourceCount: 1 });

/**
 * Open long at 100 with the default risk levels (stop 50, take 120)
 * and a 1.5% target spread.
 */
export const createTestPosition = (
  overrides: Partial<Position> = {},
): Position => ({
  positionId: 'pos-1',
  orderId: 'order-1',
  symbol: 'BTC/USDT',
  side: 'long',
  size: new FinancialDecimal(1),
  entryPrice: new FinancialDecimal(100),
  entrySpread: new FinancialDecimal(8),
  entryTime: new Date('2024-01-01T12:00:00.000Z'),
  targetSpread: new FinancialDecimal('1.5'),
  stopLossPrice: new FinancialDecimal(50),
  takeProfitPrice: new FinancialDecimal(120),
  status: PositionStatus.OPEN,
  isPaper: true,
  ...overrides,
});

/** Opportunity with spread and direction derived from the two prices. */
export const createOpportunity = (
  symbol: string,
  referencePrice: number,
  comparisonPrice: number,
  detectedAt: Date = new Date(),
): Opportunity => {
  const ref = new FinancialDecimal(referencePrice);
  const cmp = new FinancialDecimal(comparisonPrice);
  return {
    symbol,
    referencePrice: ref,
    comparisonPrice: cmp,
    spreadPercent: FinancialMath.calculateSpreadPercent(ref, cmp),
    direction: FinancialMath.resolveDirection(ref, cmp),
    detectedAt,
  };
};

export const createQuoteMap = (...quotes: Quote[]): QuoteMap =>
  new Map(quotes.map((q) => [q.symbol, q]));

/**
 * Creates a complete mock of IQuoteSource.
 * getQuotes resolves to an empty map unless overridden.
 */
export const createMockQuoteSource = (
  venue: VenueRole = VenueRole.REFERENCE,
  overrides: Record<string, unknown> = {},
) => ({
  getVenueRole: vi.fn().mockReturnValue(venue),
  getQuotes: vi.fn().mockResolvedValue(new Map()),
  getQuote: vi.fn().mockResolvedValue(null),
  connect: vi.fn().mockResolvedValue(undefined),
  disconnect: vi.fn().mockResolvedValue(undefined),
  ...overrides,
});

/**
 * Creates a complete mock of IOrderGateway in test mode.
 * open/close succeed without a fill price unless overridden.
 */
export const createMockOrderGateway = (
  overrides: Record<string, unknown> = {},
) => ({
  getMode: vi.fn().mockReturnValue('test'),
  open: vi.fn(
    (
      symbol: string,
      side: TradeDirection,
      size: number,
    ): Promise<OpenOrderResult> =>
      Promise.resolve({
        orderId: `order-${symbol}`,
        symbol,
        side,
        size,
        fillPrice: null,
        status: 'filled',
        timestamp: new Date(),
      }),
  ),
  close: vi.fn(
    (symbol: string): Promise<CloseOrderResult> =>
      Promise.resolve({ symbol, status: 'closed', fillPrice: null }),
  ),
  balance: vi.fn(
    (): Promise<GatewayBalance> => Promise.resolve({ free: 1000, total: 1000 }),
  ),
  connect: vi.fn().mockResolvedValue(undefined),
  disconnect: vi.fn().mockResolvedValue(undefined),
  ...overrides,
});

/** Mock of the EventEmitter2 surface the engine uses. */
export const createMockEventEmitter = () => ({
  emit: vi.fn().mockReturnValue(true),
  emitAsync: vi.fn().mockResolvedValue([]),
});
