import { describe, it, expect } from 'vitest';
import { LinearCurve } from './linear-curve.js';
import { CurveInputError, SpotPriceOverflowError } from './errors.js';
import { MAX_UINT128 } from '../utils/math.js';

const PERCENT = 10n ** 16n;

describe('LinearCurve', () => {
  const curve = new LinearCurve();

  describe('increasePrice', () => {
    it('should add delta to the spot price', () => {
      expect(curve.increasePrice(100n, 10n)).toBe(110n);
      expect(curve.increasePrice(0n, 0n)).toBe(0n);
    });

    it('should reach exactly MAX_UINT128 without failing', () => {
      expect(curve.increasePrice(MAX_UINT128 - 5n, 5n)).toBe(MAX_UINT128);
    });

    it('should fail instead of wrapping when the sum exceeds uint128', () => {
      expect(() => curve.increasePrice(MAX_UINT128, 1n)).toThrow(SpotPriceOverflowError);
      expect(() => curve.increasePrice(MAX_UINT128 - 5n, 6n)).toThrow(
        'Spot price overflow'
      );
    });

    it('should reject inputs outside uint128', () => {
      expect(() => curve.increasePrice(-1n, 1n)).toThrow(CurveInputError);
      expect(() => curve.increasePrice(1n, MAX_UINT128 + 1n)).toThrow(CurveInputError);
    });
  });

  describe('decreasePrice', () => {
    it('should subtract delta from the spot price', () => {
      expect(curve.decreasePrice(100n, 10n)).toBe(90n);
      expect(curve.decreasePrice(100n, 100n)).toBe(0n);
    });

    it('should saturate at zero when delta exceeds the spot price', () => {
      expect(curve.decreasePrice(5n, 10n)).toBe(0n);
      expect(curve.decreasePrice(0n, MAX_UINT128)).toBe(0n);
    });
  });

  describe('validation', () => {
    it('should accept any uint128 delta and spot price', () => {
      expect(curve.validateDelta(0n)).toBe(true);
      expect(curve.validateDelta(MAX_UINT128)).toBe(true);
      expect(curve.validateSpotPrice(123n)).toBe(true);
    });

    it('should reject values outside uint128', () => {
      expect(curve.validateDelta(-1n)).toBe(false);
      expect(curve.validateSpotPrice(MAX_UINT128 + 1n)).toBe(false);
    });
  });

  describe('getBuyInfo', () => {
    it('should price n items as the sum of the next n spot prices plus fees', () => {
      // 110 + 120 + 130 = 360; protocol fee 0.5% -> 1; trade fee 10% -> 36
      const result = curve.getBuyInfo({
        spotPrice: 100n,
        delta: 10n,
        numItems: 3n,
        feeMultiplier: 10n * PERCENT,
        protocolFeeMultiplier: PERCENT / 2n,
      });

      expect(result).toEqual({
        error: 'OK',
        newSpotPrice: 130n,
        newDelta: 10n,
        inputValue: 397n,
        protocolFee: 1n,
      });
    });

    it('should reject zero items', () => {
      const result = curve.getBuyInfo({
        spotPrice: 100n,
        delta: 10n,
        numItems: 0n,
        feeMultiplier: 0n,
        protocolFeeMultiplier: 0n,
      });

      expect(result).toEqual({ error: 'INVALID_NUMITEMS' });
    });

    it('should report overflow of the resulting spot price', () => {
      const result = curve.getBuyInfo({
        spotPrice: MAX_UINT128 - 1n,
        delta: 1n,
        numItems: 2n,
        feeMultiplier: 0n,
        protocolFeeMultiplier: 0n,
      });

      expect(result).toEqual({ error: 'SPOT_PRICE_OVERFLOW' });
    });
    it('should reject a delta outside uint128', () => {
      expect(() =>
        curve.getBuyInfo({
          spotPrice: 100n,
          delta: MAX_UINT128 + 1n,
          numItems: 1n,
          feeMultiplier: 0n,
          protocolFeeMultiplier: 0n,
        })
      ).toThrow('Invalid delta: 340282366920938463463374607431768211456 is not a uint128');
    });
  });

  describe('getSellInfo', () => {
    it('should pay out the current and lower spot prices minus fees', () => {
      // 100 + 90 + 80 = 270; protocol fee 0.5% -> 1; trade fee 10% -> 27
      const result = curve.getSellInfo({
        spotPrice: 100n,
        delta: 10n,
        numItems: 3n,
        feeMultiplier: 10n * PERCENT,
        protocolFeeMultiplier: PERCENT / 2n,
      });

      expect(result).toEqual({
        error: 'OK',
        newSpotPrice: 70n,
        newDelta: 10n,
        outputValue: 242n,
        protocolFee: 1n,
      });
    });

    it('should stop counting items once the price reaches zero', () => {
      // Only 25, 15 and 5 are paid out
      const result = curve.getSellInfo({
        spotPrice: 25n,
        delta: 10n,
        numItems: 5n,
        feeMultiplier: 0n,
        protocolFeeMultiplier: 0n,
      });

      expect(result).toEqual({
        error: 'OK',
        newSpotPrice: 0n,
        newDelta: 10n,
        outputValue: 45n,
        protocolFee: 0n,
      });
    });

    it('should reject zero items', () => {
      const result = curve.getSellInfo({
        spotPrice: 100n,
        delta: 10n,
        numItems: 0n,
        feeMultiplier: 0n,
        protocolFeeMultiplier: 0n,
      });

      expect(result.error).toBe('INVALID_NUMITEMS');
    });

    it('should reject a negative spot price', () => {
      expect(() =>
        curve.getSellInfo({
          spotPrice: -1n,
          delta: 0n,
          numItems: 1n,
          feeMultiplier: 0n,
          protocolFeeMultiplier: 0n,
        })
      ).toThrow(CurveInputError);
    });
  });
});
