export * from './pair-variant.js';
export * from './pair.types.js';
