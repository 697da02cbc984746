import { VenueRole } from './venue.type';

export interface Quote {
  symbol: string;
  venue: VenueRole;
  price: number;
  timestamp: Date;
  sourceCount: number;
}

/** Quotes for one tick, keyed by symbol. A missing key means no usable quote. */
export type QuoteMap = ReadonlyMap<string, Quote>;

export interface TickQuotes {
  reference: QuoteMap;
  comparison: QuoteMap;
}
