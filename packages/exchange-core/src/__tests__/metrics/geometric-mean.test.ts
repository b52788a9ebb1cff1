import { describe, it, expect } from 'vitest';
import { calculateGeometricMean } from '../../metrics/geometric-mean.js';
import { InvalidArgumentError } from '../../errors.js';

describe('calculateGeometricMean', () => {
  it('빈 배열이면 null', () => {
    expect(calculateGeometricMean([])).toBeNull();
  });

  it('값이 하나면 정확히 그 값', () => {
    expect(calculateGeometricMean([110])).toBe(110);
  });

  it('모든 값이 같으면 정확히 그 값', () => {
    expect(calculateGeometricMean([42.5, 42.5, 42.5])).toBe(42.5);
  });

  it('(Π p)^(1/n)과 일치해야 함', () => {
    const prices = [110, 120, 130, 140, 150];

    const result = calculateGeometricMean(prices);

    expect(result).toBeCloseTo(Math.pow(110 * 120 * 130 * 140 * 150, 1 / 5), 10);
  });

  it('입력 순서와 무관해야 함', () => {
    const a = calculateGeometricMean([2, 8, 32]);
    const b = calculateGeometricMean([32, 2, 8]);

    // (2 × 8 × 32)^(1/3) = 8
    expect(a).toBeCloseTo(8, 12);
    expect(b).toBeCloseTo(8, 12);
  });

  it('곱이 overflow 되는 대량 입력도 계산해야 함', () => {
    const prices: number[] = [];
    for (let i = 0; i < 10000; i++) {
      prices.push(1e3, 1e5);
    }

    // 직접 곱하면 Infinity
    expect(prices.reduce((p, v) => p * v, 1)).toBe(Number.POSITIVE_INFINITY);
    expect(calculateGeometricMean(prices)).toBeCloseTo(1e4, 4);
  });

  it('범위가 극단적으로 넓은 값도 순서와 무관하게 계산해야 함', () => {
    // 1e-200 × 1e200 = 1, 비율 1e200 / 1e-200 은 overflow
    expect(calculateGeometricMean([1e-200, 1e200])).toBeCloseTo(1, 12);
    expect(calculateGeometricMean([1e200, 1e-200])).toBeCloseTo(1, 12);
  });

  it('0 이하 값이 있으면 InvalidArgumentError', () => {
    expect(() => calculateGeometricMean([100, 0])).toThrow(InvalidArgumentError);
    expect(() => calculateGeometricMean([-5])).toThrow(InvalidArgumentError);
  });
});
