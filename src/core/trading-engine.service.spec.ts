import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { TradingEngineService } from './trading-engine.service';
import { MarketDataService } from '../modules/market-data/market-data.service';
import { OpportunityScannerService } from '../modules/opportunity-detection/opportunity-scanner.service';
import { PositionManagerService } from '../modules/position-management/position-manager.service';
import { StatisticsService } from '../modules/statistics/statistics.service';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import { EVENT_NAMES, OpportunityIdentifiedEvent } from '../common/events';
import { Opportunity } from '../common/types/opportunity.type';
import { TickQuotes } from '../common/types/quote.type';
import { VenueRole } from '../common/types/venue.type';
import {
  createMockEventEmitter,
  createQuote,
  createQuoteMap,
  createTestEngineConfig,
} from '../test/mock-factories';

const NOW = new Date('2024-01-01T12:00:00.000Z');

const tickQuotes = (
  prices: Record<string, [number, number]>,
  at: Date = NOW,
): TickQuotes => ({
  reference: createQuoteMap(
    ...Object.entries(prices).map(([symbol, [ref]]) =>
      createQuote(symbol, ref, VenueRole.REFERENCE, at),
    ),
  ),
  comparison: createQuoteMap(
    ...Object.entries(prices).map(([symbol, [, cmp]]) =>
      createQuote(symbol, cmp, VenueRole.COMPARISON, at),
    ),
  ),
});

describe('TradingEngineService', () => {
  let service: TradingEngineService;
  let statistics: StatisticsService;
  let eventEmitter: ReturnType<typeof createMockEventEmitter>;
  let marketData: { fetchQuotes: ReturnType<typeof vi.fn> };
  let positionManager: {
    considerEntry: ReturnType<typeof vi.fn>;
    evaluateOpenPositions: ReturnType<typeof vi.fn>;
    getOpenPositionCount: ReturnType<typeof vi.fn>;
  };

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    eventEmitter = createMockEventEmitter();
    marketData = {
      fetchQuotes: vi.fn().mockResolvedValue(tickQuotes({})),
    };
    positionManager = {
      considerEntry: vi.fn((opportunity: Opportunity) =>
        Promise.resolve({
          symbol: opportunity.symbol,
          opened: true,
          reason: 'opened',
        }),
      ),
      evaluateOpenPositions: vi.fn().mockResolvedValue([]),
      getOpenPositionCount: vi.fn().mockReturnValue(0),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TradingEngineService,
        OpportunityScannerService,
        StatisticsService,
        {
          provide: ENGINE_CONFIG,
          useValue: createTestEngineConfig({
            symbols: ['BTC/USDT', 'ETH/USDT'],
            minSpreadPercent: 7.5,
          }),
        },
        { provide: MarketDataService, useValue: marketData },
        { provide: PositionManagerService, useValue: positionManager },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = module.get(TradingEngineService);
    statistics = module.get(StatisticsService);
    statistics.startSession(NOW);
    vi.spyOn(service['logger'], 'log').mockImplementation(() => undefined);
    vi.spyOn(service['logger'], 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fetch quotes for the configured symbols', async () => {
    await service.executeTick();

    expect(marketData.fetchQuotes).toHaveBeenCalledWith([
      'BTC/USDT',
      'ETH/USDT',
    ]);
  });

  it('should emit and enter only the symbol above the minimum spread', async () => {
    marketData.fetchQuotes.mockResolvedValue(
      tickQuotes({ 'BTC/USDT': [45000, 48500], 'ETH/USDT': [3200, 3230] }),
    );

    const result = await service.executeTick();

    expect(result.opportunitiesDetected).toBe(1);
    expect(result.referenceQuoteCount).toBe(2);
    expect(positionManager.considerEntry).toHaveBeenCalledTimes(1);
    expect(positionManager.considerEntry.mock.calls[0]?.[0]).toMatchObject({
      symbol: 'BTC/USDT',
      direction: 'long',
    });
    expect(result.entries).toEqual([
      { symbol: 'BTC/USDT', opened: true, reason: 'opened' },
    ]);

    expect(eventEmitter.emit).toHaveBeenCalledTimes(1);
    const [name, event] = eventEmitter.emit.mock.calls[0] ?? [];
    expect(name).toBe(EVENT_NAMES.OPPORTUNITY_IDENTIFIED);
    expect(event).toBeInstanceOf(OpportunityIdentifiedEvent);
    expect(statistics.getSnapshot().opportunitiesDetected).toBe(1);
  });

  it('should feed opportunities to entry one at a time in symbol order', async () => {
    marketData.fetchQuotes.mockResolvedValue(
      tickQuotes({ 'BTC/USDT': [100, 110], 'ETH/USDT': [100, 90] }),
    );
    const order: string[] = [];
    positionManager.considerEntry.mockImplementation(
      async (opportunity: Opportunity) => {
        order.push(`start:${opportunity.symbol}`);
        await Promise.resolve();
        order.push(`end:${opportunity.symbol}`);
        return { symbol: opportunity.symbol, opened: true, reason: 'opened' };
      },
    );

    await service.executeTick();

    expect(order).toEqual([
      'start:BTC/USDT',
      'end:BTC/USDT',
      'start:ETH/USDT',
      'end:ETH/USDT',
    ]);
  });

  it('should evaluate exits against the same quotes and clock', async () => {
    const quotes = tickQuotes({ 'BTC/USDT': [100, 101] });
    marketData.fetchQuotes.mockResolvedValue(quotes);

    await service.executeTick();

    expect(positionManager.evaluateOpenPositions).toHaveBeenCalledWith(
      quotes.reference,
      quotes.comparison,
      NOW,
    );
  });

  it('should roll daily statistics over when the tick crosses midnight', async () => {
    const nextDay = new Date('2024-01-02T00:00:01.000Z');
    vi.setSystemTime(nextDay);
    marketData.fetchQuotes.mockResolvedValue(tickQuotes({}, nextDay));

    await service.executeTick();

    expect(statistics.getSnapshot().lastResetDate).toBe('2024-01-02');
    expect(eventEmitter.emit).toHaveBeenCalledWith(
      EVENT_NAMES.STATS_DAILY_ARCHIVED,
      expect.anything(),
    );
  });

  it('should prefer an explicit clock over the tick start', async () => {
    const later = new Date('2024-01-01T12:00:05.000Z');
    marketData.fetchQuotes.mockResolvedValue(
      tickQuotes({ 'BTC/USDT': [45000, 48500] }),
    );

    const result = await service.executeTick(later);

    // Quotes are 5s old against a 2s freshness window.
    expect(result.opportunitiesDetected).toBe(0);
    expect(positionManager.evaluateOpenPositions).toHaveBeenCalledWith(
      expect.anything(),
      expect.anything(),
      later,
    );
  });

  it('should tag the tick with one correlation id', async () => {
    marketData.fetchQuotes.mockResolvedValue(
      tickQuotes({ 'BTC/USDT': [45000, 48500] }),
    );

    const result = await service.executeTick();

    const event = eventEmitter.emit.mock.calls[0]?.[1];
    expect(result.correlationId).toEqual(expect.any(String));
    expect(event).toMatchObject({ correlationId: result.correlationId });
  });

  it('should report a failed tick instead of rejecting', async () => {
    marketData.fetchQuotes.mockRejectedValue(new Error('boom'));

    const result = await service.executeTick();

    expect(result.error).toBe('boom');
    expect(positionManager.considerEntry).not.toHaveBeenCalled();
    expect(service['logger'].error).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Tick failed' }),
    );
  });

  it('should keep fast quotes fresh when the other venue answers slowly', async () => {
    const referenceAt = new Date(NOW.getTime() + 100);
    const comparisonAt = new Date(NOW.getTime() + 2200);
    marketData.fetchQuotes.mockImplementation(async () => {
      vi.setSystemTime(comparisonAt);
      return {
        reference: createQuoteMap(
          createQuote('BTC/USDT', 45000, VenueRole.REFERENCE, referenceAt),
        ),
        comparison: createQuoteMap(
          createQuote('BTC/USDT', 48500, VenueRole.COMPARISON, comparisonAt),
        ),
      };
    });

    const result = await service.executeTick();

    // The reference quote is 2.1s older than the comparison quote, beyond the
    // 2s window, but both arrived after the tick began.
    expect(result.opportunitiesDetected).toBe(1);
    expect(positionManager.evaluateOpenPositions).toHaveBeenCalledWith(
      expect.anything(),
      expect.anything(),
      NOW,
    );
  });
});
