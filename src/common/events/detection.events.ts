import { BaseEvent } from './base.event';
import { Opportunity } from '../types/opportunity.type';

/**
 * Emitted when a symbol's spread meets the minimum entry threshold.
 */
export class OpportunityIdentifiedEvent extends BaseEvent {
  constructor(
    public readonly opportunity: Opportunity,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
