import { Inject, Injectable, Logger } from '@nestjs/common';
import { IQuoteSource } from '../../common/interfaces/quote-source.interface';
import { Quote, QuoteMap } from '../../common/types/quote.type';
import { VenueRole } from '../../common/types/venue.type';
import { ENGINE_CONFIG } from '../../common/config/engine-config.constants';
import {
  EngineConfig,
  QuoteSourceConfig,
} from '../../common/config/engine-config.type';
import {
  PlatformApiError,
  PLATFORM_ERROR_CODES,
} from '../../common/errors/platform-api-error';
import { getCorrelationId } from '../../common/services/correlation-context';
import { FinancialDecimal, mapWithConcurrency } from '../../common/utils';
import { QuoteCache } from '../cache/quote-cache';
import { fetchJson } from '../http/fetch-json';
import {
  DEX_TOP_PAIRS,
  DexPair,
  STABLE_QUOTE_SYMBOLS,
  isDexPair,
  isDexSearchResponse,
} from './dexscreener.types';

const SEARCH_PATH = '/latest/dex/search';

interface ScoredPrice {
  price: number;
  score: number;
}

/**
 * Comparison venue prices from DexScreener pair search.
 *
 * Per symbol: keep stablecoin-quoted pairs whose base token matches and that
 * clear the liquidity and 24h volume floors, score them by
 * `liquidity * 0.7 + volume * 0.3`, and take the median price of the top 3.
 */
@Injectable()
export class DexScreenerQuoteSource implements IQuoteSource {
  private readonly logger = new Logger(DexScreenerQuoteSource.name);
  private readonly baseUrl: string;
  private readonly settings: Readonly<QuoteSourceConfig>;
  private readonly cache: QuoteCache<Quote>;

  constructor(@Inject(ENGINE_CONFIG) config: EngineConfig) {
    this.settings = config.quoteSources;
    this.baseUrl = config.quoteSources.comparisonBaseUrl.replace(/\/+$/, '');
    this.cache = new QuoteCache<Quote>(config.quoteSources.comparisonCacheTtlMs);
  }

  getVenueRole(): VenueRole {
    return VenueRole.COMPARISON;
  }

  async getQuotes(symbols: readonly string[]): Promise<QuoteMap> {
    const results = await mapWithConcurrency(
      symbols,
      this.settings.comparisonMaxConcurrency,
      (symbol) => this.getQuote(symbol),
    );

    const quotes = new Map<string, Quote>();
    for (const quote of results) {
      if (quote) quotes.set(quote.symbol, quote);
    }
    return quotes;
  }

  async getQuote(symbol: string): Promise<Quote | null> {
    const cached = this.cache.get(symbol);
    if (cached) return cached;

    try {
      const pairs = await this.searchPairs(this.searchTermFor(symbol));
      const quote = this.priceFromPairs(symbol, pairs);
      if (!quote) {
        this.logger.debug({
          message: 'No qualifying DEX pairs',
          module: 'connectors',
          correlationId: getCorrelationId(),
          data: { symbol, pairsReturned: pairs.length },
        });
        return null;
      }
      this.cache.set(symbol, quote);
      return quote;
    } catch (error) {
      this.logger.warn({
        message: 'Comparison quote fetch failed',
        module: 'connectors',
        correlationId: getCorrelationId(),
        data: {
          symbol,
          code: error instanceof PlatformApiError ? error.code : undefined,
          error: error instanceof Error ? error.message : 'Unknown error',
        },
      });
      return null;
    }
  }

  connect(): Promise<void> {
    this.logger.log({
      message: 'Comparison quote source ready',
      module: 'connectors',
      data: {
        baseUrl: this.baseUrl,
        cacheTtlMs: this.settings.comparisonCacheTtlMs,
        maxConcurrency: this.settings.comparisonMaxConcurrency,
      },
    });
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    this.cache.clear();
    return Promise.resolve();
  }

  private baseTokenOf(symbol: string): string {
    return (symbol.split('/')[0] ?? symbol).toUpperCase();
  }

  private searchTermFor(symbol: string): string {
    return this.settings.comparisonSearchAliases[symbol] ?? this.baseTokenOf(symbol);
  }

  private async searchPairs(term: string): Promise<DexPair[]> {
    const url = `${this.baseUrl}${SEARCH_PATH}?q=${encodeURIComponent(term)}`;
    const payload = await fetchJson(
      url,
      this.settings.requestTimeoutMs,
      VenueRole.COMPARISON,
    );
    if (!isDexSearchResponse(payload)) {
      throw new PlatformApiError(
        PLATFORM_ERROR_CODES.SCHEMA_CHANGE,
        'DEX search payload did not match the expected schema',
        VenueRole.COMPARISON,
        'error',
        { url },
      );
    }
    return (payload.pairs ?? []).filter(isDexPair);
  }

  private priceFromPairs(symbol: string, pairs: DexPair[]): Quote | null {
    const baseToken = this.baseTokenOf(symbol);
    const scored: ScoredPrice[] = [];

    for (const pair of pairs) {
      const liquidity = pair.liquidity?.usd ?? 0;
      const volume = pair.volume?.h24 ?? 0;
      const price = Number(pair.priceUsd);
      if (
        !STABLE_QUOTE_SYMBOLS.has(pair.quoteToken.symbol.toUpperCase()) ||
        pair.baseToken.symbol.toUpperCase() !== baseToken ||
        liquidity <= this.settings.comparisonMinLiquidityUsd ||
        volume <= this.settings.comparisonMinVolumeUsd ||
        !Number.isFinite(price) ||
        price <= 0
      ) {
        continue;
      }
      scored.push({ price, score: liquidity * 0.7 + volume * 0.3 });
    }

    if (scored.length === 0) return null;

    const prices = scored
      .sort((a, b) => b.score - a.score)
      .slice(0, DEX_TOP_PAIRS)
      .map((s) => s.price)
      .sort((a, b) => a - b);

    return {
      symbol,
      venue: VenueRole.COMPARISON,
      price: this.median(prices),
      timestamp: new Date(),
      sourceCount: prices.length,
    };
  }

  /** Mean of two prices, middle of three. */
  private median(sorted: number[]): number {
    const [first = 0, second = 0] = sorted;
    if (sorted.length === 1) return first;
    if (sorted.length === 2) {
      return new FinancialDecimal(first).plus(second).div(2).toNumber();
    }
    return sorted[Math.floor(sorted.length / 2)] ?? first;
  }
}
