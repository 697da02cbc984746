import { EntryDecision, CloseResult } from '../../modules/position-management/types';

export interface TickStageDurations {
  fetchMs: number;
  scanMs: number;
  entryMs: number;
  exitMs: number;
}

/** Summary of one engine tick, returned by TradingEngineService.executeTick. */
export interface TickResult {
  correlationId: string | undefined;
  startedAt: Date;
  durationMs: number;
  stageDurations: TickStageDurations;
  referenceQuoteCount: number;
  comparisonQuoteCount: number;
  opportunitiesDetected: number;
  entries: EntryDecision[];
  exits: CloseResult[];
  /** Set when the tick aborted on an unexpected error. */
  error?: string;
}
