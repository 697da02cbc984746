import { Opportunity } from '../../../common/types/opportunity.type';

export interface ScanResult {
  /** In configured symbol order. */
  opportunities: Opportunity[];
  symbolsEvaluated: number;
  symbolsSkipped: number;
  cycleDurationMs: number;
}
