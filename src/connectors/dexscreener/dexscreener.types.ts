/** Subset of a DexScreener search result pair that pricing relies on. */
export interface DexPair {
  baseToken: { symbol: string };
  quoteToken: { symbol: string };
  priceUsd?: string;
  liquidity?: { usd?: number };
  volume?: { h24?: number };
}

export interface DexSearchResponse {
  pairs: DexPair[] | null;
}

/** Quote tokens accepted as a USD price. */
export const STABLE_QUOTE_SYMBOLS: ReadonlySet<string> = new Set([
  'USDT',
  'USDC',
]);

/** How many of the best-scored pairs feed the median. */
export const DEX_TOP_PAIRS = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function hasSymbol(value: unknown): value is { symbol: string } {
  return isRecord(value) && typeof value['symbol'] === 'string';
}

function isOptionalNumberField(value: unknown, key: string): boolean {
  return (
    value === undefined ||
    (isRecord(value) &&
      (value[key] === undefined || typeof value[key] === 'number'))
  );
}

export function isDexPair(value: unknown): value is DexPair {
  return (
    isRecord(value) &&
    hasSymbol(value['baseToken']) &&
    hasSymbol(value['quoteToken']) &&
    (value['priceUsd'] === undefined || typeof value['priceUsd'] === 'string') &&
    isOptionalNumberField(value['liquidity'], 'usd') &&
    isOptionalNumberField(value['volume'], 'h24')
  );
}

/**
 * Malformed individual pairs are tolerated (filtered later), only the
 * envelope must match.
 */
export function isDexSearchResponse(
  value: unknown,
): value is { pairs: unknown[] | null } {
  return (
    isRecord(value) &&
    (value['pairs'] === null || Array.isArray(value['pairs']))
  );
}
