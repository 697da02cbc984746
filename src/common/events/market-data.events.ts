import { BaseEvent } from './base.event';
import { VenueRole } from '../types/venue.type';

/**
 * Emitted when a quote source throws or exceeds its timeout during a tick.
 * The tick continues with an empty quote map for that venue.
 */
export class QuoteSourceFailedEvent extends BaseEvent {
  constructor(
    public readonly venue: VenueRole,
    public readonly reason: string,
    public readonly timedOut: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
