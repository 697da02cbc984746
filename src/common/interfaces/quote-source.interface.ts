import { Quote, QuoteMap, VenueRole } from '../types';

/**
 * Price feed for one venue. Implementations may serve from a short-TTL cache.
 * getQuotes returns a partial map when some symbols fail; it rejects only
 * when the whole request fails.
 */
export interface IQuoteSource {
  getVenueRole(): VenueRole;

  getQuotes(symbols: readonly string[]): Promise<QuoteMap>;

  /** Returns null when the venue has no usable price for the symbol. */
  getQuote(symbol: string): Promise<Quote | null>;

  connect(): Promise<void>;

  disconnect(): Promise<void>;
}
