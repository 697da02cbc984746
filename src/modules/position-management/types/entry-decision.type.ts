export type EntrySkipReason =
  | 'shutting_down'
  | 'position_exists'
  | 'in_flight'
  | 'max_positions'
  | 'daily_loss_limit'
  | 'insufficient_balance'
  | 'size_not_positive'
  | 'gateway_rejected';

export interface EntryDecision {
  symbol: string;
  opened: boolean;
  /** 'opened' on success. */
  reason: EntrySkipReason | 'opened';
  positionId?: string;
}
