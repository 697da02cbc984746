export * from './base.event';
export * from './event-catalog';
export * from './detection.events';
export * from './position.events';
export * from './statistics.events';
export * from './market-data.events';
