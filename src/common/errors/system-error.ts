/**
 * Base error class for all system errors.
 * Subclasses define error code ranges:
 * - PlatformApiError: 1000-1999
 * - Execution failures: 2000-2999 (codes only, see EXECUTION_ERROR_CODES)
 * - SystemHealthError: 4000-4999
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: 'critical' | 'error' | 'warning',
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
