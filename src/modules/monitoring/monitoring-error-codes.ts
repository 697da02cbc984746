/** Monitoring error codes (range 4006+ within SystemHealthError 4000-4999). */
export const MONITORING_ERROR_CODES = {
  /** Trade log CSV write failed. Logged, never halts a tick */
  CSV_WRITE_FAILED: 4008,
  /** Session report JSON write failed */
  REPORT_WRITE_FAILED: 4009,
} as const;
