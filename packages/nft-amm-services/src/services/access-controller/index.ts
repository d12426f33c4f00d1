export * from './access-controller-service.js';
