/**
 * Pair Types
 *
 * Configuration and serialization shapes for pair instances.
 */

import type { Address } from 'viem';
import type { PairVariant, PoolType } from './pair-variant.js';

// ============================================================================
// CONFIG (immutable, embedded in the clone)
// ============================================================================

/**
 * Immutable configuration of a pair.
 * Fixed at instantiation and embedded in the clone's runtime code.
 */
export interface PairImmutableConfig {
  /** Address of the clone */
  address: Address;
  /** Factory that produced the clone */
  factory: Address;
  /** Bonding curve pricing the pair */
  bondingCurve: Address;
  /** NFT collection the pair trades */
  nft: Address;
  poolType: PoolType;
  /** Template the clone was derived from */
  variant: PairVariant;
  /** Token traded against (TOKEN pairs only) */
  token?: Address;
}

// ============================================================================
// STATE (set once by initialize)
// ============================================================================

/**
 * Parameters passed to a freshly created pair by the factory.
 */
export interface PairInitParams {
  owner: Address;
  /** Zero address means "the pair itself" */
  assetRecipient: Address;
  delta: bigint;
  /** Trade fee multiplier (1e18 = 100%); TRADE pairs only */
  fee: bigint;
  spotPrice: bigint;
}

// ============================================================================
// JSON SERIALIZATION
// ============================================================================

/**
 * JSON representation of a pair.
 * bigint fields are serialized as decimal strings.
 */
export interface PairJSON {
  address: string;
  factory: string;
  bondingCurve: string;
  nft: string;
  poolType: PoolType;
  variant: PairVariant;
  token?: string;
  owner: string | null;
  assetRecipient: string | null;
  delta: string;
  fee: string;
  spotPrice: string;
}
