import Big from 'big.js';
import type { DateTime, Duration } from 'luxon';
import type { Trade } from '../types.js';

/**
 * 조회 구간 내 체결 선택
 *
 * 기준 시각과의 차이가 구간 이하인 체결만 포함 (경계 포함)
 *
 * @param trades - 체결 이력 (시간순)
 * @param asOf - 기준 시각
 * @param window - 조회 구간
 */
export function selectTradesInWindow(
  trades: readonly Trade[],
  asOf: DateTime,
  window: Duration
): Trade[] {
  const asOfMs = asOf.toMillis();
  const windowMs = window.toMillis();

  return trades.filter((trade) => asOfMs - trade.timestamp.toMillis() <= windowMs);
}

/**
 * 거래량 가중 평균 가격 (VWAP)
 *
 * Σ(수량 × 가격) / Σ(수량)
 *
 * @param trades - 대상 체결 목록
 * @returns VWAP, 체결이 없으면 null
 *
 * @example
 * ```typescript
 * const recent = selectTradesInWindow(share.trades, DateTime.utc(), DEFAULT_VWAP_WINDOW);
 * const vwap = calculateVolumeWeightedPrice(recent);
 * ```
 */
export function calculateVolumeWeightedPrice(trades: readonly Trade[]): Big | null {
  if (trades.length === 0) {
    return null;
  }

  let notional = new Big(0);
  let volume = new Big(0);

  for (const trade of trades) {
    notional = notional.plus(trade.price.times(trade.quantity));
    volume = volume.plus(trade.quantity);
  }

  return notional.div(volume);
}
