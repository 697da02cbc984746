/**
 * Centralized catalog of all domain event names.
 * Use these constants when emitting or subscribing to events.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., PositionOpenedEvent)
 */

export const EVENT_NAMES = {
  // ============================================================================
  // DETECTION
  // ============================================================================

  /** Emitted when a symbol's spread meets the minimum entry threshold */
  OPPORTUNITY_IDENTIFIED: 'detection.opportunity.identified',

  // ============================================================================
  // POSITION LIFECYCLE
  // ============================================================================

  /** Emitted after the gateway fills an entry and the position is tracked */
  POSITION_OPENED: 'position.opened',

  /** Emitted when the gateway rejects or throws on an entry */
  POSITION_OPEN_FAILED: 'position.open.failed',

  /** Emitted after the gateway confirms closure and PnL is recorded */
  POSITION_CLOSED: 'position.closed',

  /** Emitted when a close fails; the position stays tracked for retry */
  POSITION_CLOSE_FAILED: 'position.close.failed',

  // ============================================================================
  // STATISTICS
  // ============================================================================

  /** Emitted once per UTC day change with the prior day's totals */
  STATS_DAILY_ARCHIVED: 'stats.daily.archived',

  /** Emitted once at shutdown with the final session snapshot */
  SESSION_SUMMARY: 'session.summary',

  // ============================================================================
  // MARKET DATA
  // ============================================================================

  /** Emitted when a quote source fails or times out for a tick */
  QUOTE_SOURCE_FAILED: 'quote.source.failed',
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
