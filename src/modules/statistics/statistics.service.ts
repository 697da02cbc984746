import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import Decimal from 'decimal.js';
import { DailyStatsArchivedEvent, EVENT_NAMES } from '../../common/events';
import { getCorrelationId } from '../../common/services/correlation-context';
import {
  DailyStatsRecord,
  SessionStats,
  SessionStatsSnapshot,
} from '../../common/types/statistics.type';
import { FinancialDecimal, formatDateUTC } from '../../common/utils';

export const ARCHIVED_DAYS_RETENTION = 30;

/**
 * In-memory session counters. Mutated only from inside a tick or the
 * shutdown routine, so no locking.
 */
@Injectable()
export class StatisticsService {
  private readonly logger = new Logger(StatisticsService.name);
  private stats: SessionStats;
  private archivedDays: DailyStatsRecord[] = [];

  constructor(private readonly eventEmitter: EventEmitter2) {
    this.stats = this.freshStats(new Date());
  }

  /** Resets every counter; the engine calls this once at bootstrap. */
  startSession(now: Date = new Date()): void {
    this.stats = this.freshStats(now);
    this.archivedDays = [];
  }

  recordOpportunities(count: number): void {
    this.stats.opportunitiesDetected += count;
  }

  recordOpen(): void {
    this.stats.totalTrades += 1;
    this.stats.dailyTradeCount += 1;
  }

  recordClose(realizedPnl: Decimal): void {
    this.stats.totalPnl = this.stats.totalPnl.add(realizedPnl);
    this.stats.dailyPnl = this.stats.dailyPnl.add(realizedPnl);
    if (realizedPnl.gt(0)) {
      this.stats.winningTrades += 1;
    }
  }

  /**
   * Archives the previous UTC day and zeroes the daily counters when `now`
   * falls on a later date than the last reset. Cumulative totals are kept.
   * Returns the archived record, or null when the date has not changed.
   */
  rollover(now: Date): DailyStatsRecord | null {
    const today = formatDateUTC(now);
    if (today === this.stats.lastResetDate) {
      return null;
    }

    const record: DailyStatsRecord = {
      date: this.stats.lastResetDate,
      dailyPnl: this.stats.dailyPnl,
      dailyTradeCount: this.stats.dailyTradeCount,
    };
    this.archivedDays.push(record);
    if (this.archivedDays.length > ARCHIVED_DAYS_RETENTION) {
      this.archivedDays.splice(
        0,
        this.archivedDays.length - ARCHIVED_DAYS_RETENTION,
      );
    }

    this.stats.dailyPnl = new FinancialDecimal(0);
    this.stats.dailyTradeCount = 0;
    this.stats.lastResetDate = today;

    this.logger.log({
      message: 'Daily statistics archived',
      module: 'statistics',
      correlationId: getCorrelationId(),
      data: {
        date: record.date,
        dailyPnl: record.dailyPnl.toString(),
        dailyTradeCount: record.dailyTradeCount,
      },
    });

    this.eventEmitter.emit(
      EVENT_NAMES.STATS_DAILY_ARCHIVED,
      new DailyStatsArchivedEvent(record, getCorrelationId()),
    );

    return record;
  }

  getDailyPnl(): Decimal {
    return this.stats.dailyPnl;
  }

  getWinRate(): number {
    if (this.stats.totalTrades === 0) {
      return 0;
    }
    return (this.stats.winningTrades / this.stats.totalTrades) * 100;
  }

  getSnapshot(): SessionStatsSnapshot {
    return Object.freeze({
      ...this.stats,
      startedAt: new Date(this.stats.startedAt.getTime()),
      winRate: this.getWinRate(),
    });
  }

  getArchivedDays(): readonly DailyStatsRecord[] {
    return [...this.archivedDays];
  }

  private freshStats(now: Date): SessionStats {
    return {
      totalTrades: 0,
      winningTrades: 0,
      totalPnl: new FinancialDecimal(0),
      dailyPnl: new FinancialDecimal(0),
      dailyTradeCount: 0,
      lastResetDate: formatDateUTC(now),
      opportunitiesDetected: 0,
      startedAt: now,
    };
  }
}
