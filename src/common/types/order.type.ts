import { TradeDirection } from './opportunity.type';

export interface OpenOrderResult {
  orderId: string;
  symbol: string;
  side: TradeDirection;
  size: number;
  /** Null when the venue did not report an average fill price. */
  fillPrice: number | null;
  status: 'filled' | 'rejected';
  timestamp: Date;
  reason?: string;
}

export interface CloseOrderResult {
  symbol: string;
  status: 'closed' | 'rejected';
  fillPrice: number | null;
  reason?: string;
}

export interface GatewayBalance {
  free: number;
  total: number;
}
