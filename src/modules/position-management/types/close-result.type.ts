import { ClosedTrade } from '../../../common/types/position.type';

export type CloseResult =
  | { closed: true; trade: ClosedTrade }
  | { closed: false; symbol: string; reason: string };

export interface ShutdownCloseReport {
  closed: ClosedTrade[];
  /** Symbols still tracked because their close failed. */
  failed: string[];
}
