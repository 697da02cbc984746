import { describe, it, expect } from 'vitest';
import {
  runWithCorrelationId,
  withCorrelationId,
} from '../services/correlation-context';
import { VenueRole } from '../types/venue.type';
import { QuoteSourceFailedEvent } from './market-data.events';
import { OpportunityIdentifiedEvent } from './detection.events';
import { createOpportunity } from '../../test/mock-factories';

describe('BaseEvent', () => {
  const sourceFailed = (correlationId?: string) =>
    new QuoteSourceFailedEvent(
      VenueRole.COMPARISON,
      'timeout after 5000ms',
      true,
      correlationId,
    );

  it('should stamp the emission time', () => {
    const before = Date.now();
    const event = sourceFailed();
    const after = Date.now();

    expect(event.timestamp).toBeInstanceOf(Date);
    expect(event.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    expect(event.timestamp.getTime()).toBeLessThanOrEqual(after);
  });

  it('should take the tick correlation ID from context', async () => {
    await runWithCorrelationId('tick-42', () => {
      const event = new OpportunityIdentifiedEvent(
        createOpportunity('BTC/USDT', 45000, 48500),
      );
      expect(event.correlationId).toBe('tick-42');
      return Promise.resolve();
    });
  });

  it('should generate UUID v4 IDs through withCorrelationId', async () => {
    await withCorrelationId(() => {
      expect(sourceFailed().correlationId).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i,
      );
      return Promise.resolve();
    });
  });

  it('should prefer an explicit ID over the context', async () => {
    await runWithCorrelationId('tick-42', () => {
      expect(sourceFailed('shutdown-1').correlationId).toBe('shutdown-1');
      return Promise.resolve();
    });
  });

  it('should leave the ID undefined outside any context', () => {
    expect(sourceFailed().correlationId).toBeUndefined();
  });

  it('should keep the subclass payload', () => {
    const event = sourceFailed('c-1');

    expect(event.venue).toBe(VenueRole.COMPARISON);
    expect(event.reason).toBe('timeout after 5000ms');
    expect(event.timedOut).toBe(true);
  });
});
