export type { ExitDecision } from './exit-decision.type';
export type { EntryDecision, EntrySkipReason } from './entry-decision.type';
export type { CloseResult, ShutdownCloseReport } from './close-result.type';
