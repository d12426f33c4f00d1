/**
 * @nft-amm/services
 *
 * Pair factory for an NFT automated market maker: deterministic pair
 * clones, clone verification, curve/router/call-target whitelists and
 * protocol fee governance.
 */

// Re-export shared types and curves from @nft-amm/shared
export * from '@nft-amm/shared';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export errors
export * from './errors/index.js';

// Export transactional primitives
export * from './atomic/index.js';

// Export events
export * from './events/index.js';

// Export asset transfer contract and in-memory ledger
export * from './assets/index.js';

// Export services
export * from './services/ownership/index.js';
export * from './services/curve-registry/index.js';
export * from './services/access-controller/index.js';
export * from './services/fee-controller/index.js';
export * from './services/clone-deployer/index.js';
export * from './services/capability/index.js';
export * from './services/pair/index.js';
export * from './services/pair-factory/index.js';
