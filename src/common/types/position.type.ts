import Decimal from 'decimal.js';
import { TradeDirection } from './opportunity.type';

/**
 * Allowed transitions:
 * OPEN → CLOSING (close requested)
 * CLOSING → CLOSED (gateway confirmed, position removed from tracking)
 * CLOSING → OPEN (gateway failed, retried next tick)
 */
export enum PositionStatus {
  OPEN = 'OPEN',
  CLOSING = 'CLOSING',
  CLOSED = 'CLOSED',
}

export type ExitReason =
  | 'quote_unavailable'
  | 'spread_converged'
  | 'stop_loss'
  | 'take_profit'
  | 'max_hold_time'
  | 'shutdown';

export interface Position {
  positionId: string;
  orderId: string;
  symbol: string;
  side: TradeDirection;
  size: Decimal;
  entryPrice: Decimal;
  entrySpread: Decimal;
  entryTime: Date;
  targetSpread: Decimal;
  stopLossPrice: Decimal;
  takeProfitPrice: Decimal;
  status: PositionStatus;
  isPaper: boolean;
}

export interface ClosedTrade {
  positionId: string;
  symbol: string;
  side: TradeDirection;
  size: Decimal;
  entryPrice: Decimal;
  exitPrice: Decimal;
  grossPnl: Decimal;
  fees: Decimal;
  realizedPnl: Decimal;
  exitReason: ExitReason;
  openedAt: Date;
  closedAt: Date;
  isPaper: boolean;
}
