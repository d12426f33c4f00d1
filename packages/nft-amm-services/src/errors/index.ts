export * from './factory-errors.js';
