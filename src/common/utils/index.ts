export { FinancialMath, FinancialDecimal } from './financial-math';
export type { RiskLevels, RealizedPnl, RealizedPnlInput } from './financial-math';
export { withTimeout, TimeoutError } from './with-timeout';
export { mapWithConcurrency } from './concurrency';
export { isQuoteFresh } from './quote-freshness';
export { formatDateUTC } from './date';
