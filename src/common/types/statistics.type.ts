import Decimal from 'decimal.js';

export interface SessionStats {
  totalTrades: number;
  winningTrades: number;
  totalPnl: Decimal;
  dailyPnl: Decimal;
  dailyTradeCount: number;
  /** UTC calendar date, YYYY-MM-DD */
  lastResetDate: string;
  opportunitiesDetected: number;
  startedAt: Date;
}

export interface SessionStatsSnapshot extends Readonly<SessionStats> {
  winRate: number;
}

export interface DailyStatsRecord {
  date: string;
  dailyPnl: Decimal;
  dailyTradeCount: number;
}
