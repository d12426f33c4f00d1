/**
 * Bonding Curve Error Classes
 */

/**
 * A price step produced a spot price that does not fit in a uint128.
 */
export class SpotPriceOverflowError extends Error {
  constructor(
    public readonly spotPrice: bigint,
    public readonly delta: bigint
  ) {
    super(`Spot price overflow: ${spotPrice} + ${delta} exceeds uint128`);
    this.name = 'SpotPriceOverflowError';
  }
}

/**
 * A curve received a spot price or delta outside the uint128 range.
 */
export class CurveInputError extends Error {
  constructor(
    public readonly field: 'spotPrice' | 'delta',
    public readonly value: bigint
  ) {
    super(`Invalid ${field}: ${value} is not a uint128`);
    this.name = 'CurveInputError';
  }
}
