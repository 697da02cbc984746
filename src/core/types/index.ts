export type { TickResult, TickStageDurations } from './tick-result.type';
