export * from './capability-probe.js';
export * from './collection-capability-service.js';
