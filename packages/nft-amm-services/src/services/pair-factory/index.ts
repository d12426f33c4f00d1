export * from './types.js';
export * from './pair-factory-service.js';
