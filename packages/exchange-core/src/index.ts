/**
 * Exchange Core
 *
 * 종목별 체결 이력과 지표 계산
 * - 배당 수익률 / P/E 비율
 * - 거래량 가중 평균 가격 (VWAP)
 * - All Share Index (기하 평균)
 */

// 타입
export type * from './types.js';

// 에러
export {
  ExchangeError,
  InvalidArgumentError,
  DivisionUndefinedError,
  NoTradesInWindowError,
  NoTradesError,
  UnsupportedCategoryError,
  ShareNotFoundError,
} from './errors.js';
export type { ExchangeErrorCode } from './errors.js';

// 설정
export {
  SHARE_CATEGORIES,
  TRADE_ACTIONS,
  DEFAULT_VWAP_WINDOW,
  DEFAULT_VWAP_WINDOW_MINUTES,
} from './config.js';

// 시계
export { systemClock, createManualClock } from './clock.js';
export type { ManualClock } from './clock.js';

// 지표
export { calculateDividendYield, calculatePeRatio } from './metrics/dividend.js';
export { selectTradesInWindow, calculateVolumeWeightedPrice } from './metrics/vwap.js';
export { calculateGeometricMean } from './metrics/geometric-mean.js';

// 종목 / 거래소
export { Share } from './share.js';
export { Exchange } from './exchange.js';

// 샘플 데이터
export { createSampleExchange, SAMPLE_SHARES, SAMPLE_TRADES } from './fixtures/sample-exchange.js';
export type { SampleExchangeOptions } from './fixtures/sample-exchange.js';
