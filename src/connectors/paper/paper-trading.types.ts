import { TradeDirection } from '../../common/types/opportunity.type';

export interface PaperGatewayOptions {
  startingBalanceUsd: number;
  slippageBps: number;
  /** Margin held per position is notional / leverage. */
  leverage: number;
}

export type FillSide = 'buy' | 'sell';

export interface SimulatedFill {
  orderId: string;
  symbol: string;
  side: FillSide;
  requestedPrice: number;
  filledPrice: number;
  quantity: number;
  timestamp: Date;
}

export interface PaperPosition {
  orderId: string;
  side: TradeDirection;
  size: number;
  entryPrice: number;
  marginUsd: number;
}
