/**
 * Type exports for @nft-amm/shared
 */

export * from './pair/index.js';
