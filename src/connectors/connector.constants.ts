/** DI tokens for the venue-facing collaborators. */
export const REFERENCE_QUOTE_SOURCE = 'IReferenceQuoteSource';
export const COMPARISON_QUOTE_SOURCE = 'IComparisonQuoteSource';
export const ORDER_GATEWAY = 'IOrderGateway';
