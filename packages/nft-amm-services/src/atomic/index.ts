export * from './atomic-scope.js';
export * from './operation-queue.js';
