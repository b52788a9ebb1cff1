import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { createSampleExchange } from '../fixtures/sample-exchange.js';
import { createManualClock } from '../clock.js';
import { DivisionUndefinedError, NoTradesError } from '../errors.js';

const clock = createManualClock(DateTime.fromISO('2025-01-02T09:00:00Z', { zone: 'utc' }));

describe('샘플 거래소', () => {
  it('다섯 종목을 등록해야 함', () => {
    const exchange = createSampleExchange({ clock });

    expect(exchange.symbols).toEqual(['TEA', 'POP', 'ALE', 'GIN', 'JOE']);
    expect(exchange.requireShare('GIN').category).toBe('Preferred');
  });

  it('TEA: 배당 수익률 0, P/E 정의 불가', () => {
    const tea = createSampleExchange({ clock }).requireShare('TEA');

    expect(tea.dividendYield(110).toNumber()).toBe(0);
    expect(() => tea.peRatio(110)).toThrow(DivisionUndefinedError);
  });

  it('POP: P/E 15', () => {
    const pop = createSampleExchange({ clock }).requireShare('POP');

    expect(pop.peRatio(120).toNumber()).toBe(15);
  });

  it('ALE: 단일 체결 VWAP 130', () => {
    const ale = createSampleExchange({ clock }).requireShare('ALE');

    expect(ale.volumeWeightedPrice().toNumber()).toBe(130);
  });

  it('All Share Index = (110·120·130·140·150)^(1/5)', () => {
    const index = createSampleExchange({ clock }).allShareIndex();

    expect(index).toBeCloseTo(Math.pow(110 * 120 * 130 * 140 * 150, 1 / 5), 10);
    expect(index).toBeCloseTo(129.2252, 4);
  });

  it('호출마다 독립된 인스턴스를 만들어야 함', () => {
    const first = createSampleExchange({ clock });
    first.requireShare('TEA').recordTrade(10, 'sell', 90);

    const second = createSampleExchange({ clock });

    expect(second.requireShare('TEA').tradeCount).toBe(1);
  });

  it('withTrades=false 이면 체결 없이 생성', () => {
    const exchange = createSampleExchange({ clock, withTrades: false });

    expect(() => exchange.allShareIndex()).toThrow(NoTradesError);
  });
});
