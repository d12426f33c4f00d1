/**
 * Pair Discriminators
 *
 * A pair trades NFTs against either the native currency or a token, and its
 * template depends on whether the NFT collection supports enumeration.
 * The two flags together select one of four pair variants.
 */

// ============================================================================
// ASSET KIND
// ============================================================================

/**
 * Fungible side of a pair
 * - 'NATIVE': native currency of the chain
 * - 'TOKEN': an ERC-20 style token
 */
export const ASSET_KINDS = ['NATIVE', 'TOKEN'] as const;

export type AssetKind = (typeof ASSET_KINDS)[number];

// ============================================================================
// POOL TYPE
// ============================================================================

/**
 * Trading direction of a pair
 * - 'TOKEN': only buys NFTs from traders
 * - 'NFT': only sells NFTs to traders
 * - 'TRADE': both, and charges a per-trade fee
 */
export const POOL_TYPES = ['TOKEN', 'NFT', 'TRADE'] as const;

export type PoolType = (typeof POOL_TYPES)[number];

/**
 * uint8 encoding of each pool type inside a clone's immutable args
 */
export const POOL_TYPE_CODES: Readonly<Record<PoolType, number>> = {
  TOKEN: 0,
  NFT: 1,
  TRADE: 2,
};

/**
 * Decode a pool type from its uint8 encoding.
 *
 * @returns The pool type, or undefined for an unknown code
 */
export function poolTypeFromCode(code: number): PoolType | undefined {
  return POOL_TYPES.find((poolType) => POOL_TYPE_CODES[poolType] === code);
}

// ============================================================================
// PAIR VARIANT
// ============================================================================

/**
 * The four pair templates, keyed by asset kind and enumeration support
 */
export const PAIR_VARIANTS = [
  'NATIVE_ENUMERABLE',
  'NATIVE_MISSING_ENUMERABLE',
  'TOKEN_ENUMERABLE',
  'TOKEN_MISSING_ENUMERABLE',
] as const;

export type PairVariant = (typeof PAIR_VARIANTS)[number];

/**
 * Select the pair variant for an asset kind and enumeration capability.
 *
 * @example
 * ```typescript
 * getPairVariant('NATIVE', true);  // 'NATIVE_ENUMERABLE'
 * getPairVariant('TOKEN', false);  // 'TOKEN_MISSING_ENUMERABLE'
 * ```
 */
export function getPairVariant(assetKind: AssetKind, enumerable: boolean): PairVariant {
  if (assetKind === 'NATIVE') {
    return enumerable ? 'NATIVE_ENUMERABLE' : 'NATIVE_MISSING_ENUMERABLE';
  }
  return enumerable ? 'TOKEN_ENUMERABLE' : 'TOKEN_MISSING_ENUMERABLE';
}

/**
 * Type guard for pair variant strings coming from untyped input.
 */
export function isPairVariant(value: unknown): value is PairVariant {
  return PAIR_VARIANTS.some((variant) => variant === value);
}

/**
 * Asset kind a variant trades against.
 */
export function getVariantAssetKind(variant: PairVariant): AssetKind {
  return variant.startsWith('NATIVE_') ? 'NATIVE' : 'TOKEN';
}

/**
 * Whether a variant is the template for enumerable collections.
 */
export function isEnumerableVariant(variant: PairVariant): boolean {
  return !variant.includes('MISSING_');
}
