import Decimal from 'decimal.js';
import { BaseEvent } from './base.event';
import { TradeDirection } from '../types/opportunity.type';
import { ClosedTrade, ExitReason, Position } from '../types/position.type';

export class PositionOpenedEvent extends BaseEvent {
  constructor(
    public readonly position: Position,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class PositionOpenFailedEvent extends BaseEvent {
  constructor(
    public readonly symbol: string,
    public readonly side: TradeDirection,
    public readonly size: Decimal,
    public readonly reasonCode: number,
    public readonly reason: string,
    correlationId?: string,
    public readonly isPaper: boolean = false,
  ) {
    super(correlationId);
  }
}

export class PositionClosedEvent extends BaseEvent {
  constructor(
    public readonly trade: ClosedTrade,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted when the gateway rejects or throws on a close.
 * The position has been reverted to OPEN and will be retried next tick.
 */
export class PositionCloseFailedEvent extends BaseEvent {
  constructor(
    public readonly positionId: string,
    public readonly symbol: string,
    public readonly exitReason: ExitReason,
    public readonly reasonCode: number,
    public readonly reason: string,
    correlationId?: string,
    public readonly isPaper: boolean = false,
  ) {
    super(correlationId);
  }
}
