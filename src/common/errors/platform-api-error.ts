import { VenueRole } from '../types/venue.type';
import { SystemError } from './system-error';

/**
 * Error class for quote venue API errors (code range 1000-1999).
 *
 * - 1001: HTTP failure (WARNING, skipped for the tick)
 * - 1002: Request timeout (WARNING, skipped for the tick)
 * - 1003: Unexpected payload schema (ERROR)
 * - 1004: Symbol not listed on venue (WARNING)
 */
export class PlatformApiError extends SystemError {
  constructor(
    code: number,
    message: string,
    public readonly venue: VenueRole,
    severity: 'critical' | 'error' | 'warning',
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }
}

export const PLATFORM_ERROR_CODES = {
  HTTP_FAILURE: 1001,
  REQUEST_TIMEOUT: 1002,
  SCHEMA_CHANGE: 1003,
  SYMBOL_NOT_FOUND: 1004,
} as const;
