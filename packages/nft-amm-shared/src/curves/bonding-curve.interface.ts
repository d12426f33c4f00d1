/**
 * Bonding Curve Interface
 *
 * A bonding curve is a pure pricing strategy: every method is a deterministic
 * function of its inputs with no side effects. Pairs reference a curve by
 * address; the factory only lets whitelisted curves be installed.
 */

import type { BuyInfo, QuoteParams, SellInfo } from './curve.types.js';

export interface BondingCurve {
  /** Human-readable curve identifier */
  readonly name: string;

  /**
   * Whether a delta is acceptable for this curve.
   */
  validateDelta(delta: bigint): boolean;

  /**
   * Whether a spot price is acceptable for this curve.
   */
  validateSpotPrice(spotPrice: bigint): boolean;

  /**
   * Spot price after one upward step.
   * Must throw rather than wrap when the result is not representable.
   */
  increasePrice(spotPrice: bigint, delta: bigint): bigint;

  /**
   * Spot price after one downward step.
   */
  decreasePrice(spotPrice: bigint, delta: bigint): bigint;

  /**
   * Quote for buying `numItems` NFTs from a pair.
   *
   * @throws CurveInputError if spotPrice or delta is not a uint128
   */
  getBuyInfo(params: QuoteParams): BuyInfo;

  /**
   * Quote for selling `numItems` NFTs to a pair.
   *
   * @throws CurveInputError if spotPrice or delta is not a uint128
   */
  getSellInfo(params: QuoteParams): SellInfo;
}
