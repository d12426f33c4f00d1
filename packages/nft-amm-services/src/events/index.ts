export * from './types.js';
export * from './factory-event-log.js';
