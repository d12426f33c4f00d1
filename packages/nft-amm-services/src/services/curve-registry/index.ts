export * from './curve-registry-service.js';
