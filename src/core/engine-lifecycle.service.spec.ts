import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EngineLifecycleService } from './engine-lifecycle.service';
import { SchedulerService } from './scheduler.service';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import {
  COMPARISON_QUOTE_SOURCE,
  ORDER_GATEWAY,
  REFERENCE_QUOTE_SOURCE,
} from '../connectors/connector.constants';
import { EVENT_NAMES, SessionSummaryEvent } from '../common/events';
import { MarketDataService } from '../modules/market-data/market-data.service';
import { PositionManagerService } from '../modules/position-management/position-manager.service';
import { StatisticsService } from '../modules/statistics/statistics.service';
import { VenueRole } from '../common/types/venue.type';
import {
  createMockEventEmitter,
  createMockOrderGateway,
  createMockQuoteSource,
  createQuote,
  createQuoteMap,
  createTestEngineConfig,
  createTestPosition,
} from '../test/mock-factories';

describe('EngineLifecycleService', () => {
  let service: EngineLifecycleService;
  let statistics: StatisticsService;
  let referenceSource: ReturnType<typeof createMockQuoteSource>;
  let comparisonSource: ReturnType<typeof createMockQuoteSource>;
  let gateway: ReturnType<typeof createMockOrderGateway>;
  let eventEmitter: ReturnType<typeof createMockEventEmitter>;
  let scheduler: {
    start: ReturnType<typeof vi.fn>;
    stop: ReturnType<typeof vi.fn>;
    waitForIdle: ReturnType<typeof vi.fn>;
  };
  let marketData: { fetchReferenceQuotes: ReturnType<typeof vi.fn> };
  let positionManager: {
    stopAcceptingEntries: ReturnType<typeof vi.fn>;
    getOpenPositions: ReturnType<typeof vi.fn>;
    getOpenPositionCount: ReturnType<typeof vi.fn>;
    closeAllPositions: ReturnType<typeof vi.fn>;
  };

  beforeEach(async () => {
    referenceSource = createMockQuoteSource(VenueRole.REFERENCE);
    comparisonSource = createMockQuoteSource(VenueRole.COMPARISON);
    gateway = createMockOrderGateway();
    eventEmitter = createMockEventEmitter();
    scheduler = {
      start: vi.fn(),
      stop: vi.fn(),
      waitForIdle: vi.fn().mockResolvedValue(undefined),
    };
    marketData = { fetchReferenceQuotes: vi.fn().mockResolvedValue(new Map()) };
    positionManager = {
      stopAcceptingEntries: vi.fn(),
      getOpenPositions: vi.fn().mockReturnValue([]),
      getOpenPositionCount: vi.fn().mockReturnValue(0),
      closeAllPositions: vi
        .fn()
        .mockResolvedValue({ closed: [], failed: [] }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EngineLifecycleService,
        StatisticsService,
        { provide: ENGINE_CONFIG, useValue: createTestEngineConfig() },
        { provide: REFERENCE_QUOTE_SOURCE, useValue: referenceSource },
        { provide: COMPARISON_QUOTE_SOURCE, useValue: comparisonSource },
        { provide: ORDER_GATEWAY, useValue: gateway },
        { provide: SchedulerService, useValue: scheduler },
        { provide: MarketDataService, useValue: marketData },
        { provide: PositionManagerService, useValue: positionManager },
        { provide: EventEmitter2, useValue: eventEmitter },
      ],
    }).compile();

    service = module.get(EngineLifecycleService);
    statistics = module.get(StatisticsService);
    vi.spyOn(service['logger'], 'log').mockImplementation(() => undefined);
    vi.spyOn(service['logger'], 'warn').mockImplementation(() => undefined);
    vi.spyOn(service['logger'], 'error').mockImplementation(() => undefined);
  });

  describe('onApplicationBootstrap', () => {
    it('should connect collaborators and start the scheduler', async () => {
      await service.onApplicationBootstrap();

      expect(referenceSource.connect).toHaveBeenCalled();
      expect(comparisonSource.connect).toHaveBeenCalled();
      expect(gateway.connect).toHaveBeenCalled();
      expect(scheduler.start).toHaveBeenCalledTimes(1);
      expect(service['logger'].log).toHaveBeenCalledWith(
        expect.objectContaining({
          message: 'Engine startup complete',
          balance: { free: 1000, total: 1000 },
        }),
      );
    });

    it('should reset session statistics', async () => {
      statistics.recordOpportunities(5);

      await service.onApplicationBootstrap();

      expect(statistics.getSnapshot().opportunitiesDetected).toBe(0);
    });

    it('should fail startup when a collaborator cannot connect', async () => {
      gateway.connect.mockRejectedValueOnce(new Error('refused'));

      await expect(service.onApplicationBootstrap()).rejects.toThrow(
        'refused',
      );
      expect(scheduler.start).not.toHaveBeenCalled();
    });

    it('should still start when the balance read fails', async () => {
      gateway.balance.mockRejectedValueOnce(new Error('unavailable'));

      await service.onApplicationBootstrap();

      expect(service['logger'].warn).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'Initial balance read failed' }),
      );
      expect(scheduler.start).toHaveBeenCalled();
    });
  });

  describe('onApplicationShutdown', () => {
    it('should stop, drain, close, summarize and disconnect in order', async () => {
      const steps: string[] = [];
      const position = createTestPosition({ symbol: 'BTC/USDT' });
      const quotes = createQuoteMap(createQuote('BTC/USDT', 110));
      positionManager.stopAcceptingEntries.mockImplementation(() =>
        steps.push('stopEntries'),
      );
      scheduler.stop.mockImplementation(() => steps.push('stop'));
      scheduler.waitForIdle.mockImplementation(() => {
        steps.push('waitForIdle');
        return Promise.resolve();
      });
      positionManager.getOpenPositions.mockReturnValue([position]);
      marketData.fetchReferenceQuotes.mockImplementation(() => {
        steps.push('fetchReferenceQuotes');
        return Promise.resolve(quotes);
      });
      positionManager.closeAllPositions.mockImplementation(() => {
        steps.push('closeAllPositions');
        return Promise.resolve({ closed: [], failed: [] });
      });
      eventEmitter.emitAsync.mockImplementation(() => {
        steps.push('summary');
        return Promise.resolve([]);
      });
      gateway.disconnect.mockImplementation(() => {
        steps.push('disconnect');
        return Promise.resolve();
      });

      await service.onApplicationShutdown('SIGTERM');

      expect(steps).toEqual([
        'stopEntries',
        'stop',
        'waitForIdle',
        'fetchReferenceQuotes',
        'closeAllPositions',
        'summary',
        'disconnect',
      ]);
      expect(marketData.fetchReferenceQuotes).toHaveBeenCalledWith([
        'BTC/USDT',
      ]);
      expect(positionManager.closeAllPositions).toHaveBeenCalledWith(quotes);
    });

    it('should not close out before the in-flight tick finishes', async () => {
      let finishTick: () => void = () => undefined;
      scheduler.waitForIdle.mockReturnValue(
        new Promise<void>((resolve) => {
          finishTick = resolve;
        }),
      );
      positionManager.getOpenPositions.mockReturnValue([
        createTestPosition({ symbol: 'BTC/USDT' }),
      ]);

      const shutdown = service.onApplicationShutdown('SIGTERM');
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(positionManager.stopAcceptingEntries).toHaveBeenCalled();
      expect(positionManager.closeAllPositions).not.toHaveBeenCalled();
      expect(gateway.disconnect).not.toHaveBeenCalled();

      finishTick();
      await shutdown;

      expect(positionManager.closeAllPositions).toHaveBeenCalledTimes(1);
      expect(gateway.disconnect).toHaveBeenCalled();
    });

    it('should skip the close step with no open positions', async () => {
      await service.onApplicationShutdown('SIGINT');

      expect(marketData.fetchReferenceQuotes).not.toHaveBeenCalled();
      expect(positionManager.closeAllPositions).not.toHaveBeenCalled();
    });

    it('should publish the session summary', async () => {
      statistics.recordOpen();
      positionManager.getOpenPositionCount.mockReturnValue(1);

      await service.onApplicationShutdown('SIGINT');

      expect(eventEmitter.emitAsync).toHaveBeenCalledTimes(1);
      const [name, event] = eventEmitter.emitAsync.mock.calls[0] ?? [];
      expect(name).toBe(EVENT_NAMES.SESSION_SUMMARY);
      expect(event).toBeInstanceOf(SessionSummaryEvent);
      expect(event).toMatchObject({ openPositionsRemaining: 1 });
      expect(event.snapshot.totalTrades).toBe(1);
      expect(event.correlationId).toEqual(expect.any(String));
    });

    it('should still disconnect when closing fails', async () => {
      positionManager.getOpenPositions.mockReturnValue([createTestPosition()]);
      positionManager.closeAllPositions.mockRejectedValue(new Error('boom'));

      await service.onApplicationShutdown('SIGTERM');

      expect(service['logger'].error).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'Error during shutdown' }),
      );
      expect(referenceSource.disconnect).toHaveBeenCalled();
      expect(gateway.disconnect).toHaveBeenCalled();
    });

    it('should log a failed disconnect without throwing', async () => {
      comparisonSource.disconnect.mockRejectedValue(new Error('already closed'));

      await expect(
        service.onApplicationShutdown('SIGTERM'),
      ).resolves.toBeUndefined();
      expect(service['logger'].warn).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'Collaborator disconnect failed' }),
      );
    });
  });
});
