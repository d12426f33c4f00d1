export * from './ownership-service.js';
