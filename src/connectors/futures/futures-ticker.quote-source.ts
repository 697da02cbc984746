import { Inject, Injectable, Logger } from '@nestjs/common';
import { IQuoteSource } from '../../common/interfaces/quote-source.interface';
import { Quote, QuoteMap } from '../../common/types/quote.type';
import { VenueRole } from '../../common/types/venue.type';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import { EngineConfig } from '../../common/config/engine-config.type';
import {
  PlatformApiError,
  PLATFORM_ERROR_CODES,
} from '../../common/errors/platform-api-error';
import { getCorrelationId } from '../../common/services/correlation-context';
import { fetchJson } from '../http/fetch-json';
import {
  FuturesTickerEntry,
  isFuturesTickerEnvelope,
  parseTickerEntries,
  fromVenueSymbol,
  toVenueSymbol,
} from './futures-ticker.types';

const TICKER_PATH = '/api/v1/contract/ticker';

/**
 * Reference venue prices from the perpetual futures REST ticker.
 * One bulk call per tick covers every configured symbol.
 */
@Injectable()
export class FuturesTickerQuoteSource implements IQuoteSource {
  private readonly logger = new Logger(FuturesTickerQuoteSource.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(@Inject(ENGINE_CONFIG) config: EngineConfig) {
    this.baseUrl = config.quoteSources.referenceBaseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.quoteSources.requestTimeoutMs;
  }

  getVenueRole(): VenueRole {
    return VenueRole.REFERENCE;
  }

  async getQuotes(symbols: readonly string[]): Promise<QuoteMap> {
    const entries = await this.fetchTicker(`${this.baseUrl}${TICKER_PATH}`);
    const wanted = new Set(symbols);
    const receivedAt = new Date();
    const quotes = new Map<string, Quote>();

    for (const entry of entries) {
      const symbol = fromVenueSymbol(entry.symbol);
      if (!wanted.has(symbol)) continue;
      const quote = this.toQuote(symbol, entry, receivedAt);
      if (quote) quotes.set(symbol, quote);
    }

    if (quotes.size < wanted.size) {
      this.logger.debug({
        message: 'Reference ticker missing some symbols',
        module: 'connectors',
        correlationId: getCorrelationId(),
        data: {
          requested: wanted.size,
          received: quotes.size,
          missing: [...wanted].filter((s) => !quotes.has(s)),
        },
      });
    }
    return quotes;
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    const url = `${this.baseUrl}${TICKER_PATH}?symbol=${encodeURIComponent(toVenueSymbol(symbol))}`;
    try {
      const entries = await this.fetchTicker(url);
      const entry = entries.find((e) => fromVenueSymbol(e.symbol) === symbol);
      return entry ? this.toQuote(symbol, entry, new Date()) : null;
    } catch (error) {
      this.logger.warn({
        message: 'Reference quote fetch failed',
        module: 'connectors',
        correlationId: getCorrelationId(),
        data: {
          symbol,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
      return null;
    }
  }

  connect(): Promise<void> {
    this.logger.log({
      message: 'Reference quote source ready',
      module: 'connectors',
      data: { baseUrl: this.baseUrl },
    });
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    return Promise.resolve();
  }

  private async fetchTicker(url: string): Promise<FuturesTickerEntry[]> {
    const payload = await fetchJson(url, this.timeoutMs, VenueRole.REFERENCE);
    if (!isFuturesTickerEnvelope(payload) || !payload.success) {
      throw this.schemaError(url);
    }

    const { entries, malformed } = parseTickerEntries(payload.data);
    if (malformed > 0) {
      // Nothing usable at all means the format changed, not a bad contract.
      if (entries.length === 0) {
        throw this.schemaError(url);
      }
      this.logger.warn({
        message: 'Dropped malformed reference ticker entries',
        module: 'connectors',
        correlationId: getCorrelationId(),
        code: PLATFORM_ERROR_CODES.SCHEMA_CHANGE,
        data: { malformed, kept: entries.length },
      });
    }
    return entries;
  }

  private schemaError(url: string): PlatformApiError {
    return new PlatformApiError(
      PLATFORM_ERROR_CODES.SCHEMA_CHANGE,
      'Reference ticker payload did not match the expected schema',
      VenueRole.REFERENCE,
      'error',
      { url },
    );
  }

  private toQuote(
    symbol: string,
    entry: FuturesTickerEntry,
    receivedAt: Date,
  ): Quote | null {
    if (!Number.isFinite(entry.lastPrice) || entry.lastPrice <= 0) {
      return null;
    }
    return {
      symbol,
      venue: VenueRole.REFERENCE,
      price: entry.lastPrice,
      timestamp: receivedAt,
      sourceCount: 1,
    };
  }
}
