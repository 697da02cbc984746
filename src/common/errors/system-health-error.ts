import { SystemError } from './system-error';

/**
 * System health errors (codes 4000-4999)
 * Used for feed staleness and collaborator health issues.
 */
export class SystemHealthError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: 'critical' | 'error' | 'warning',
    public readonly component?: string,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, metadata);
  }
}

export const SYSTEM_HEALTH_ERROR_CODES = {
  /** Quote missing or older than the freshness window. Warning level. */
  QUOTE_UNAVAILABLE: 4003,
} as const;
