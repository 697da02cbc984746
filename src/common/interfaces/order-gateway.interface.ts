import {
  CloseOrderResult,
  GatewayBalance,
  GatewayMode,
  OpenOrderResult,
  TradeDirection,
} from '../types';

/**
 * Exposure gateway on the reference venue. The mode is fixed at construction.
 * Rejections are reported in the result status; thrown errors mean the
 * request outcome is unknown and are treated as failures by callers.
 */
export interface IOrderGateway {
  getMode(): GatewayMode;

  open(
    symbol: string,
    side: TradeDirection,
    size: number,
  ): Promise<OpenOrderResult>;

  close(symbol: string): Promise<CloseOrderResult>;

  balance(): Promise<GatewayBalance>;

  connect(): Promise<void>;

  disconnect(): Promise<void>;
}
