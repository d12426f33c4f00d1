export * from './factory-config.js';
