/**
 * Fixed-Point Math
 *
 * Fee multipliers use 18-decimal fixed point ("WAD"): 1e18 represents 1.0.
 * Spot prices and deltas are uint128 quantities.
 */

/** 1.0 in 18-decimal fixed point */
export const WAD = 10n ** 18n;

/** Largest uint128 value */
export const MAX_UINT128 = (1n << 128n) - 1n;

/** Largest uint256 value */
export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Multiply two WAD values, rounding down.
 *
 * @example
 * ```typescript
 * mulWadDown(1000n, 5n * 10n ** 16n); // 50n (5% of 1000)
 * ```
 */
export function mulWadDown(x: bigint, y: bigint): bigint {
  return (x * y) / WAD;
}

/**
 * Whether a value fits in a uint128.
 */
export function isUint128(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT128;
}

/**
 * Whether a value fits in a uint256.
 */
export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256;
}
