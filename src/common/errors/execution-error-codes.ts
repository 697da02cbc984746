/** Order execution failures (range 2000-2999), carried in logs and failure events. */
export const EXECUTION_ERROR_CODES = {
  GATEWAY_REJECTED: 2002,
  CLOSE_FAILED: 2007,
} as const;
