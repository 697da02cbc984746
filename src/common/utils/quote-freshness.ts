import { Quote } from '../types/quote.type';

/** A quote older than `maxAgeMs` at `now` cannot be traded on. */
export function isQuoteFresh(
  quote: Quote | undefined,
  now: Date,
  maxAgeMs: number,
): quote is Quote {
  if (!quote) return false;
  return now.getTime() - quote.timestamp.getTime() <= maxAgeMs;
}
