import { InvalidArgumentError } from '../errors.js';

/**
 * 기하 평균 계산
 *
 * (Π p)^(1/n) 을 로그 합으로 계산한다. 체결 수가 많아도 곱이 overflow 되지 않고,
 * 값의 순서와 무관하다. 모든 값이 같으면 정확히 그 값을 반환한다.
 *
 * @param values - 양수 배열
 * @returns 기하 평균, 빈 배열이면 null
 */
export function calculateGeometricMean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }

  let logSum = 0;
  let uniform = true;

  for (const value of values) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidArgumentError('기하 평균은 양의 유한값만 허용합니다', [`value: ${value}`]);
    }
    logSum += Math.log(value);
    uniform = uniform && value === values[0];
  }

  if (uniform) {
    return values[0];
  }

  return Math.exp(logSum / values.length);
}
