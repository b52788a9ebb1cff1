import type Big from 'big.js';
import type { DateTime, Duration } from 'luxon';

// =============================================================================
// Trade
// =============================================================================

/**
 * 체결 방향
 */
export type TradeAction = 'buy' | 'sell';

/**
 * 단일 체결 기록 (생성 후 불변)
 */
export interface Trade {
  readonly timestamp: DateTime;
  readonly quantity: number;
  readonly action: TradeAction;
  readonly price: Big;
}

// =============================================================================
// Share
// =============================================================================

/**
 * 종목 구분
 */
export type ShareCategory = 'Common' | 'Preferred';

/**
 * 배당 수익률 계산에 필요한 종목 조건
 */
export interface DividendTerms {
  category: ShareCategory;
  lastDividend: number;
  fixedDividendRate?: number;  // 0-1, Preferred 전용
  parValue: number;
}

/**
 * 종목 생성 파라미터
 */
export interface ShareParams extends DividendTerms {
  symbol: string;
}

/**
 * 현재 시각 공급자
 */
export interface Clock {
  now(): DateTime;
}

/**
 * 종목 옵션
 */
export interface ShareOptions {
  clock?: Clock;
  retention?: Duration;  // 미지정 시 전체 이력 보존
}

// =============================================================================
// Metrics
// =============================================================================

/**
 * VWAP 조회 옵션
 */
export interface VwapOptions {
  asOf?: DateTime;
  window?: Duration;  // 기본값 15분
}
