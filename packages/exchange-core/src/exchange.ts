import { createLogger } from '@workspace/shared-utils';
import { InvalidArgumentError, NoTradesError, ShareNotFoundError } from './errors.js';
import { calculateGeometricMean } from './metrics/geometric-mean.js';
import type { Share } from './share.js';

const logger = createLogger('exchange');

/**
 * 거래소 (심볼별 종목 레지스트리 + 전체 지수)
 */
export class Exchange {
  private readonly shares = new Map<string, Share>();

  constructor(shares: Iterable<Share> = []) {
    for (const share of shares) {
      this.addShare(share);
    }
  }

  get size(): number {
    return this.shares.size;
  }

  get symbols(): string[] {
    return [...this.shares.keys()];
  }

  /**
   * 종목 등록
   *
   * @throws InvalidArgumentError 이미 등록된 심볼인 경우
   */
  addShare(share: Share): void {
    if (this.shares.has(share.symbol)) {
      throw new InvalidArgumentError(`이미 등록된 종목: ${share.symbol}`);
    }
    this.shares.set(share.symbol, share);
    logger.debug('종목 등록', { symbol: share.symbol, category: share.category });
  }

  /**
   * 종목 제거
   *
   * @returns 제거된 종목, 없으면 undefined
   */
  removeShare(symbol: string): Share | undefined {
    const key = symbol.toUpperCase();
    const share = this.shares.get(key);
    if (share) {
      this.shares.delete(key);
      logger.info('종목 제거', { symbol: key, trades: share.tradeCount });
    }
    return share;
  }

  getShare(symbol: string): Share | undefined {
    return this.shares.get(symbol.toUpperCase());
  }

  /**
   * @throws ShareNotFoundError 등록되지 않은 심볼
   */
  requireShare(symbol: string): Share {
    const share = this.getShare(symbol);
    if (!share) {
      throw new ShareNotFoundError(symbol.toUpperCase());
    }
    return share;
  }

  listShares(): Share[] {
    return [...this.shares.values()];
  }

  /**
   * All Share Index (전 종목 전체 체결 가격의 기하 평균)
   *
   * @throws NoTradesError 거래소 전체 체결이 없는 경우
   */
  allShareIndex(): number {
    const prices: number[] = [];
    for (const share of this.shares.values()) {
      for (const trade of share.trades) {
        prices.push(trade.price.toNumber());
      }
    }

    const index = calculateGeometricMean(prices);
    if (index === null) {
      throw new NoTradesError();
    }

    return index;
  }
}
