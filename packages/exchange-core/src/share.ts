import Big from 'big.js';
import type { Duration } from 'luxon';
import { createLogger, toIsoString } from '@workspace/shared-utils';
import { systemClock } from './clock.js';
import { DEFAULT_VWAP_WINDOW } from './config.js';
import { InvalidArgumentError, NoTradesInWindowError } from './errors.js';
import { calculateDividendYield, calculatePeRatio } from './metrics/dividend.js';
import { calculateVolumeWeightedPrice, selectTradesInWindow } from './metrics/vwap.js';
import { ShareParamsSchema, TradeInputSchema, parseInput } from './schemas.js';
import type {
  Clock,
  ShareCategory,
  ShareOptions,
  ShareParams,
  Trade,
  TradeAction,
  VwapOptions,
} from './types.js';

const logger = createLogger('exchange-share');

/**
 * 종목 (체결 이력 보관 + 종목별 지표)
 *
 * @example
 * ```typescript
 * const pop = new Share({ symbol: 'POP', category: 'Common', lastDividend: 8, parValue: 100 });
 * pop.recordTrade(200, 'sell', 120);
 * pop.peRatio(120).toNumber(); // 15
 * ```
 */
export class Share {
  readonly symbol: string;
  readonly category: ShareCategory;
  readonly lastDividend: number;
  readonly fixedDividendRate: number | undefined;
  readonly parValue: number;

  private readonly clock: Clock;
  private readonly retention: Duration | undefined;
  private readonly history: Trade[] = [];

  constructor(params: ShareParams, options: ShareOptions = {}) {
    const parsed = parseInput(ShareParamsSchema, params, '종목 파라미터가 올바르지 않습니다');

    this.symbol = parsed.symbol;
    this.category = parsed.category;
    this.lastDividend = parsed.lastDividend;
    // Common 종목은 고정 배당률을 사용하지 않음
    this.fixedDividendRate = parsed.category === 'Preferred' ? parsed.fixedDividendRate : undefined;
    this.parValue = parsed.parValue;

    this.clock = options.clock ?? systemClock;

    if (options.retention !== undefined && !(options.retention.isValid && options.retention.toMillis() > 0)) {
      throw new InvalidArgumentError('보존 기간은 0보다 커야 합니다');
    }
    this.retention = options.retention;
  }

  /**
   * 체결 이력 스냅샷 (시간순)
   */
  get trades(): readonly Trade[] {
    return Object.freeze([...this.history]);
  }

  get tradeCount(): number {
    return this.history.length;
  }

  /**
   * 체결 기록
   *
   * @param quantity - 체결 수량 (양의 정수)
   * @param action - 'buy' | 'sell'
   * @param price - 체결 가격 (양수)
   * @returns 기록된 체결
   */
  recordTrade(quantity: number, action: TradeAction, price: number): Trade {
    const input = parseInput(
      TradeInputSchema,
      { quantity, action, price },
      `[${this.symbol}] 체결 입력이 올바르지 않습니다`
    );

    const trade: Trade = Object.freeze({
      timestamp: this.clock.now(),
      quantity: input.quantity,
      action: input.action,
      price: new Big(input.price),
    });

    this.history.push(trade);
    logger.debug('체결 기록', {
      symbol: this.symbol,
      timestamp: toIsoString(trade.timestamp),
      quantity: trade.quantity,
      action: trade.action,
      price: trade.price.toString(),
    });

    this.evictExpired();

    return trade;
  }

  /**
   * 배당 수익률
   */
  dividendYield(price: number): Big {
    return calculateDividendYield(this, price);
  }

  /**
   * P/E 비율
   *
   * @throws DivisionUndefinedError 최근 배당금이 0인 경우
   */
  peRatio(price: number): Big {
    return calculatePeRatio(this, price);
  }

  /**
   * 최근 구간 거래량 가중 평균 가격
   *
   * @param options.asOf - 기준 시각 (기본값: 현재)
   * @param options.window - 조회 구간 (기본값: 15분)
   * @throws NoTradesInWindowError 구간 내 체결이 없는 경우
   */
  volumeWeightedPrice(options: VwapOptions = {}): Big {
    const asOf = options.asOf ?? this.clock.now();
    const window = options.window ?? DEFAULT_VWAP_WINDOW;

    if (!asOf.isValid) {
      throw new InvalidArgumentError('VWAP 기준 시각이 올바르지 않습니다');
    }
    if (!window.isValid || window.toMillis() < 0) {
      throw new InvalidArgumentError('VWAP 조회 구간은 0 이상이어야 합니다');
    }

    const vwap = calculateVolumeWeightedPrice(selectTradesInWindow(this.history, asOf, window));
    if (vwap === null) {
      throw new NoTradesInWindowError(this.symbol, window.toMillis());
    }

    return vwap;
  }

  private evictExpired() {
    if (!this.retention) return;

    const cutoffMs = this.clock.now().minus(this.retention).toMillis();
    // 시계가 되돌려진 경우 시간순이 아닐 수 있으므로 전체를 검사
    const kept = this.history.filter((trade) => trade.timestamp.toMillis() >= cutoffMs);
    const evicted = this.history.length - kept.length;

    if (evicted > 0) {
      this.history.splice(0, this.history.length, ...kept);
      logger.debug('보존 기간 경과 체결 정리', { symbol: this.symbol, evicted });
    }
  }
}
