import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  COMPARISON_QUOTE_SOURCE,
  REFERENCE_QUOTE_SOURCE,
} from '../../connectors/connector.constants';
import { IQuoteSource } from '../../common/interfaces';
import { QuoteMap, TickQuotes } from '../../common/types/quote.type';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import { withTimeout, TimeoutError } from '../../common/utils';
import { EVENT_NAMES } from '../../common/events/event-catalog';
import { QuoteSourceFailedEvent } from '../../common/events/market-data.events';
import { getCorrelationId } from '../../common/services/correlation-context';

/**
 * Joins both venues' quotes for one tick. Each source is bounded by
 * quoteTimeoutMs; a failed or slow source contributes an empty map and the
 * other source's result is kept.
 */
@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    @Inject(REFERENCE_QUOTE_SOURCE)
    private readonly referenceSource: IQuoteSource,
    @Inject(COMPARISON_QUOTE_SOURCE)
    private readonly comparisonSource: IQuoteSource,
    @Inject(ENGINE_CONFIG) private readonly config: EngineConfig,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async fetchQuotes(symbols: readonly string[]): Promise<TickQuotes> {
    const [reference, comparison] = await Promise.all([
      this.fetchFrom(this.referenceSource, symbols),
      this.fetchFrom(this.comparisonSource, symbols),
    ]);
    return { reference, comparison };
  }

  /** Reference side only; used to price exits at shutdown. */
  fetchReferenceQuotes(symbols: readonly string[]): Promise<QuoteMap> {
    return this.fetchFrom(this.referenceSource, symbols);
  }

  private async fetchFrom(
    source: IQuoteSource,
    symbols: readonly string[],
  ): Promise<QuoteMap> {
    if (symbols.length === 0) {
      return new Map();
    }

    const venue = source.getVenueRole();
    try {
      return await withTimeout(
        source.getQuotes(symbols),
        this.config.quoteTimeoutMs,
      );
    } catch (error) {
      const timedOut = error instanceof TimeoutError;
      const reason = error instanceof Error ? error.message : 'Unknown error';

      this.logger.warn({
        message: `${venue} quote source ${timedOut ? 'timed out' : 'failed'}, continuing without it`,
        module: 'market-data',
        correlationId: getCorrelationId(),
        data: { venue, reason, symbols: symbols.length },
      });
      this.eventEmitter.emit(
        EVENT_NAMES.QUOTE_SOURCE_FAILED,
        new QuoteSourceFailedEvent(venue, reason, timedOut),
      );
      return new Map();
    }
  }
}
