/** One contract entry of the futures venue's REST ticker. */
export interface FuturesTickerEntry {
  symbol: string;
  lastPrice: number;
  timestamp?: number;
}

/** Ticker envelope; entries are checked one by one after this. */
export interface FuturesTickerEnvelope {
  success: boolean;
  data: unknown;
}

export interface ParsedTickerEntries {
  entries: FuturesTickerEntry[];
  /** Entries that failed the shape check and were dropped. */
  malformed: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isFuturesTickerEntry(
  value: unknown,
): value is FuturesTickerEntry {
  return (
    isRecord(value) &&
    typeof value['symbol'] === 'string' &&
    typeof value['lastPrice'] === 'number' &&
    (value['timestamp'] === undefined || typeof value['timestamp'] === 'number')
  );
}

export function isFuturesTickerEnvelope(
  value: unknown,
): value is FuturesTickerEnvelope {
  if (!isRecord(value) || typeof value['success'] !== 'boolean') {
    return false;
  }
  const data = value['data'];
  return Array.isArray(data) || isRecord(data);
}

/** Bulk responses carry an array, single-contract responses one object. */
export function parseTickerEntries(data: unknown): ParsedTickerEntries {
  const raw: unknown[] = Array.isArray(data) ? data : [data];
  const entries = raw.filter(isFuturesTickerEntry);
  return { entries, malformed: raw.length - entries.length };
}

/** BTC/USDT → BTC_USDT */
export function toVenueSymbol(symbol: string): string {
  return symbol.replace('/', '_');
}

/** BTC_USDT → BTC/USDT */
export function fromVenueSymbol(venueSymbol: string): string {
  return venueSymbol.replace('_', '/');
}
