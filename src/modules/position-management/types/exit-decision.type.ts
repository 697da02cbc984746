import Decimal from 'decimal.js';
import { ExitReason } from '../../../common/types/position.type';

export type ExitDecision =
  | { triggered: false; currentSpread: Decimal }
  | {
      triggered: true;
      reason: ExitReason;
      /** Null when a quote was unavailable. */
      currentSpread: Decimal | null;
    };
