import { BaseEvent } from './base.event';
import {
  DailyStatsRecord,
  SessionStatsSnapshot,
} from '../types/statistics.type';

export class DailyStatsArchivedEvent extends BaseEvent {
  constructor(
    public readonly record: DailyStatsRecord,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class SessionSummaryEvent extends BaseEvent {
  constructor(
    public readonly snapshot: SessionStatsSnapshot,
    public readonly endedAt: Date,
    public readonly openPositionsRemaining: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
