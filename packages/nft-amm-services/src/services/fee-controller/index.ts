export * from './fee-controller-service.js';
