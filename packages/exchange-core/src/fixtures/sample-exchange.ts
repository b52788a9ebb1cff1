import { Exchange } from '../exchange.js';
import { Share } from '../share.js';
import type { Clock, ShareParams, TradeAction } from '../types.js';

export const SAMPLE_SHARES: readonly ShareParams[] = [
  { symbol: 'TEA', category: 'Common', lastDividend: 0, parValue: 100 },
  { symbol: 'POP', category: 'Common', lastDividend: 8, parValue: 100 },
  { symbol: 'ALE', category: 'Common', lastDividend: 23, parValue: 60 },
  { symbol: 'GIN', category: 'Preferred', lastDividend: 8, fixedDividendRate: 0.02, parValue: 100 },
  { symbol: 'JOE', category: 'Common', lastDividend: 13, parValue: 250 },
];

export const SAMPLE_TRADES: readonly { symbol: string; quantity: number; action: TradeAction; price: number }[] = [
  { symbol: 'TEA', quantity: 100, action: 'buy', price: 110 },
  { symbol: 'POP', quantity: 200, action: 'sell', price: 120 },
  { symbol: 'ALE', quantity: 150, action: 'buy', price: 130 },
  { symbol: 'GIN', quantity: 250, action: 'sell', price: 140 },
  { symbol: 'JOE', quantity: 300, action: 'buy', price: 150 },
];

export interface SampleExchangeOptions {
  clock?: Clock;
  withTrades?: boolean;
}

/**
 * 샘플 거래소 생성 (TEA, POP, ALE, GIN, JOE)
 *
 * 호출할 때마다 새 인스턴스를 만든다.
 */
export function createSampleExchange(options: SampleExchangeOptions = {}): Exchange {
  const { clock, withTrades = true } = options;
  const exchange = new Exchange(SAMPLE_SHARES.map((params) => new Share(params, { clock })));

  if (withTrades) {
    for (const trade of SAMPLE_TRADES) {
      exchange.requireShare(trade.symbol).recordTrade(trade.quantity, trade.action, trade.price);
    }
  }

  return exchange;
}
