export { VenueRole } from './venue.type';
export type { GatewayMode } from './venue.type';
export type { Quote, QuoteMap, TickQuotes } from './quote.type';
export type { Opportunity, TradeDirection } from './opportunity.type';
export { PositionStatus } from './position.type';
export type { Position, ClosedTrade, ExitReason } from './position.type';
export type {
  OpenOrderResult,
  CloseOrderResult,
  GatewayBalance,
} from './order.type';
export type {
  SessionStats,
  SessionStatsSnapshot,
  DailyStatsRecord,
} from './statistics.type';
