import Big from 'big.js';
import { DivisionUndefinedError, InvalidArgumentError, UnsupportedCategoryError } from '../errors.js';
import { PriceSchema, parseInput } from '../schemas.js';
import type { DividendTerms, ShareParams } from '../types.js';

/**
 * 배당 수익률 계산
 *
 * - Common: 최근 배당금 / 가격
 * - Preferred: (고정 배당률 × 액면가) / 가격
 *
 * @param terms - 종목 배당 조건
 * @param price - 현재 주가
 * @returns 배당 수익률 (비율, 0.05 = 5%)
 *
 * @example
 * ```typescript
 * const yieldValue = calculateDividendYield(
 *   { category: 'Preferred', lastDividend: 8, fixedDividendRate: 0.02, parValue: 100 },
 *   140
 * );
 * console.log(yieldValue.toFixed(4)); // 0.0143
 * ```
 */
export function calculateDividendYield(terms: DividendTerms, price: number): Big {
  const validPrice = parseInput(PriceSchema, price, '배당 수익률 계산 가격이 올바르지 않습니다');

  switch (terms.category) {
    case 'Common':
      return new Big(terms.lastDividend).div(validPrice);
    case 'Preferred':
      if (terms.fixedDividendRate === undefined) {
        throw new InvalidArgumentError('Preferred 종목에는 고정 배당률이 필요합니다');
      }
      return new Big(terms.fixedDividendRate).times(terms.parValue).div(validPrice);
    default:
      return rejectCategory(terms.category);
  }
}

function rejectCategory(category: never): never {
  throw new UnsupportedCategoryError(String(category));
}

/**
 * P/E 비율 계산 (가격 / 최근 배당금)
 *
 * @param share - 종목 심볼과 최근 배당금
 * @param price - 현재 주가
 * @returns P/E 비율
 * @throws DivisionUndefinedError 최근 배당금이 0인 경우
 */
export function calculatePeRatio(
  share: Pick<ShareParams, 'symbol' | 'lastDividend'>,
  price: number
): Big {
  const validPrice = parseInput(PriceSchema, price, 'P/E 계산 가격이 올바르지 않습니다');

  if (share.lastDividend === 0) {
    throw new DivisionUndefinedError(share.symbol);
  }

  return new Big(validPrice).div(share.lastDividend);
}
