/**
 * Utility functions for the NFT AMM
 */

// Fixed-point and integer-range utilities
export * from './math.js';

// EVM utilities
export * from './evm/index.js';
