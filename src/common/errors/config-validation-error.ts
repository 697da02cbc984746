import { SystemError } from './system-error';

/**
 * Thrown when engine configuration validation fails at startup.
 * Code 4010, in the SystemHealth range (4000-4999).
 * Severity: critical. The engine does not start without a valid configuration.
 */
export class ConfigValidationError extends SystemError {
  constructor(
    message: string,
    public readonly validationErrors: string[],
  ) {
    super(4010, message, 'critical', { validationErrors });
  }
}
