/**
 * Bonding Curve Types
 */

/**
 * Outcome of a multi-item quote
 * - 'OK': quote succeeded
 * - 'INVALID_NUMITEMS': zero items requested
 * - 'SPOT_PRICE_OVERFLOW': the resulting spot price does not fit in a uint128
 */
export type CurveError = 'OK' | 'INVALID_NUMITEMS' | 'SPOT_PRICE_OVERFLOW';

/**
 * Inputs shared by buy and sell quotes.
 * Fee multipliers are 18-decimal fixed point.
 */
export interface QuoteParams {
  spotPrice: bigint;
  delta: bigint;
  numItems: bigint;
  /** Pair trade fee (TRADE pairs) */
  feeMultiplier: bigint;
  /** Protocol fee taken by the factory */
  protocolFeeMultiplier: bigint;
}

export interface CurveQuoteFailure {
  error: Exclude<CurveError, 'OK'>;
}

/**
 * Quote for a trader buying NFTs from a pair.
 */
export type BuyInfo =
  | {
      error: 'OK';
      newSpotPrice: bigint;
      newDelta: bigint;
      /** Amount the trader pays, fees included */
      inputValue: bigint;
      protocolFee: bigint;
    }
  | CurveQuoteFailure;

/**
 * Quote for a trader selling NFTs to a pair.
 */
export type SellInfo =
  | {
      error: 'OK';
      newSpotPrice: bigint;
      newDelta: bigint;
      /** Amount the trader receives, fees deducted */
      outputValue: bigint;
      protocolFee: bigint;
    }
  | CurveQuoteFailure;
