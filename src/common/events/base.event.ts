import { getCorrelationId } from '../services/correlation-context';

/**
 * Envelope shared by every engine event: when it was raised and the
 * correlation ID of the tick or shutdown run that raised it.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date = new Date();
  public readonly correlationId: string | undefined;

  /** An explicit ID wins over the ambient correlation context. */
  protected constructor(correlationId?: string) {
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
