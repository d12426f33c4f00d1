/**
 * @nft-amm/shared
 *
 * Shared types, bonding curves and utilities for the NFT AMM.
 * Used by the factory services and anything quoting pair prices.
 */

// Export all types
export * from './types/index.js';

// Export bonding curves
export * from './curves/index.js';

// Export all utilities
export * from './utils/index.js';

// Export protocol constants
export * from './constants.js';
