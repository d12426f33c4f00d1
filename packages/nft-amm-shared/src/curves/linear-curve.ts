/**
 * Linear Bonding Curve
 *
 * Each item bought raises the spot price by `delta`; each item sold lowers it
 * by `delta`, flooring at zero.
 */

import type { BondingCurve } from './bonding-curve.interface.js';
import type { BuyInfo, QuoteParams, SellInfo } from './curve.types.js';
import { CurveInputError, SpotPriceOverflowError } from './errors.js';
import { MAX_UINT128, isUint128, mulWadDown } from '../utils/math.js';

export class LinearCurve implements BondingCurve {
  readonly name = 'linear';

  validateDelta(delta: bigint): boolean {
    return isUint128(delta);
  }

  validateSpotPrice(spotPrice: bigint): boolean {
    return isUint128(spotPrice);
  }

  /**
   * `spotPrice + delta`
   *
   * @throws SpotPriceOverflowError if the sum exceeds uint128
   */
  increasePrice(spotPrice: bigint, delta: bigint): bigint {
    assertUint128Inputs(spotPrice, delta);

    const newSpotPrice = spotPrice + delta;
    if (newSpotPrice > MAX_UINT128) {
      throw new SpotPriceOverflowError(spotPrice, delta);
    }
    return newSpotPrice;
  }

  /**
   * `spotPrice - delta`, or 0 when `delta > spotPrice`.
   */
  decreasePrice(spotPrice: bigint, delta: bigint): bigint {
    assertUint128Inputs(spotPrice, delta);

    return spotPrice >= delta ? spotPrice - delta : 0n;
  }

  /**
   * Buying n items costs the sum of the next n spot prices:
   * `n * (spot + delta) + n(n-1)/2 * delta`, then trade fee and protocol fee
   * are added on top.
   */
  getBuyInfo(params: QuoteParams): BuyInfo {
    const { spotPrice, delta, numItems, feeMultiplier, protocolFeeMultiplier } = params;
    assertUint128Inputs(spotPrice, delta);

    if (numItems === 0n) {
      return { error: 'INVALID_NUMITEMS' };
    }

    const newSpotPrice = spotPrice + delta * numItems;
    if (newSpotPrice > MAX_UINT128) {
      return { error: 'SPOT_PRICE_OVERFLOW' };
    }

    // The first item is bought at spot + delta
    const buySpotPrice = spotPrice + delta;
    let inputValue = numItems * buySpotPrice + (numItems * (numItems - 1n) * delta) / 2n;

    const protocolFee = mulWadDown(inputValue, protocolFeeMultiplier);
    inputValue += mulWadDown(inputValue, feeMultiplier);
    inputValue += protocolFee;

    return {
      error: 'OK',
      newSpotPrice,
      newDelta: delta,
      inputValue,
      protocolFee,
    };
  }

  /**
   * Selling n items pays out the current spot price and n-1 lower ones.
   * When the price would go negative, the quote only counts items down to a
   * price of zero.
   */
  getSellInfo(params: QuoteParams): SellInfo {
    const { spotPrice, delta, feeMultiplier, protocolFeeMultiplier } = params;
    let { numItems } = params;
    assertUint128Inputs(spotPrice, delta);

    if (numItems === 0n) {
      return { error: 'INVALID_NUMITEMS' };
    }

    const totalPriceDecrease = delta * numItems;
    let newSpotPrice: bigint;

    if (spotPrice < totalPriceDecrease) {
      newSpotPrice = 0n;
      // delta > 0 here, since totalPriceDecrease > spotPrice >= 0
      numItems = spotPrice / delta + 1n;
    } else {
      newSpotPrice = spotPrice - totalPriceDecrease;
    }

    let outputValue = numItems * spotPrice - (numItems * (numItems - 1n) * delta) / 2n;

    const protocolFee = mulWadDown(outputValue, protocolFeeMultiplier);
    outputValue -= mulWadDown(outputValue, feeMultiplier);
    outputValue -= protocolFee;

    return {
      error: 'OK',
      newSpotPrice,
      newDelta: delta,
      outputValue,
      protocolFee,
    };
  }
}

function assertUint128Inputs(spotPrice: bigint, delta: bigint): void {
  if (!isUint128(spotPrice)) {
    throw new CurveInputError('spotPrice', spotPrice);
  }
  if (!isUint128(delta)) {
    throw new CurveInputError('delta', delta);
  }
}
