import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level AsyncLocalStorage for correlation IDs.
 * Not a NestJS provider: ticks and shutdown run outside any request scope.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs `fn` under a fresh correlation ID. Every log line and event created
 * inside (including nested awaits) carries the same ID.
 *
 * @example
 * await withCorrelationId(() => this.tradingEngine.executeTick());
 */
export function withCorrelationId<T>(fn: () => Promise<T>): Promise<T> {
  return runWithCorrelationId(uuidv4(), fn);
}

/** Same as {@link withCorrelationId} but with a caller-chosen ID. */
export function runWithCorrelationId<T>(
  correlationId: string,
  fn: () => Promise<T>,
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/** Undefined outside a correlation context. */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
