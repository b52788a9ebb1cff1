import type Big from 'big.js';
import { Duration } from 'luxon';
import {
  DivisionUndefinedError,
  InvalidArgumentError,
  NoTradesError,
  NoTradesInWindowError,
  type Exchange,
  type Share,
  type ShareCategory,
} from '@workspace/exchange-core';

export interface ShareReportRow {
  symbol: string;
  category: ShareCategory;
  price: number;
  dividendYield: string;
  peRatio: string;
  vwap: string;
}

export interface MarketReport {
  rows: ShareReportRow[];
  index: number | null;  // 체결이 없으면 null
}

export interface ReportOptions {
  price?: number;
  window: Duration;
}

const UNAVAILABLE = 'N/A';

/**
 * CLI 숫자 인자 해석 (양수만 허용)
 */
export function parsePositiveNumber(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(`${label} 값이 올바르지 않습니다: ${raw}`);
  }
  return value;
}

export function windowFromMinutes(minutes: number): Duration {
  return Duration.fromObject({ minutes });
}

/**
 * 지표 계산 기준 가격 (지정값 우선, 없으면 마지막 체결 가격)
 */
export function resolveQuotePrice(share: Share, override?: number): number {
  if (override !== undefined) {
    return override;
  }

  const trades = share.trades;
  if (trades.length === 0) {
    throw new InvalidArgumentError(`[${share.symbol}] 체결이 없어 기준 가격을 지정해야 합니다`);
  }
  return trades[trades.length - 1].price.toNumber();
}

function formatOrUnavailable(
  compute: () => Big,
  digits: number,
  isExpected: (error: unknown) => boolean
): string {
  try {
    return compute().toFixed(digits);
  } catch (error) {
    if (isExpected(error)) {
      return UNAVAILABLE;
    }
    throw error;
  }
}

/**
 * 종목별 지표 행 생성
 */
export function buildShareReport(share: Share, options: ReportOptions): ShareReportRow {
  const price = resolveQuotePrice(share, options.price);

  return {
    symbol: share.symbol,
    category: share.category,
    price,
    dividendYield: share.dividendYield(price).toFixed(4),
    peRatio: formatOrUnavailable(
      () => share.peRatio(price),
      2,
      (error) => error instanceof DivisionUndefinedError
    ),
    vwap: formatOrUnavailable(
      () => share.volumeWeightedPrice({ window: options.window }),
      2,
      (error) => error instanceof NoTradesInWindowError
    ),
  };
}

/**
 * 거래소 전체 리포트 데이터
 */
export function buildMarketReport(exchange: Exchange, options: ReportOptions): MarketReport {
  const rows = exchange.listShares().map((share) => buildShareReport(share, options));

  let index: number | null = null;
  try {
    index = exchange.allShareIndex();
  } catch (error) {
    if (!(error instanceof NoTradesError)) {
      throw error;
    }
  }

  return { rows, index };
}

export function formatShareRow(row: ShareReportRow): string {
  return `${row.symbol} (${row.category}) | 가격: ${row.price.toFixed(2)} | 배당 수익률: ${row.dividendYield} | P/E: ${row.peRatio} | VWAP: ${row.vwap}`;
}

/**
 * 거래소 리포트 문자열 생성
 */
export function formatMarketReport(report: MarketReport, window: Duration): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('='.repeat(60));
  lines.push('GBCE 거래소 리포트');
  lines.push('='.repeat(60));
  lines.push('');

  lines.push(`## 종목 지표 (VWAP 구간: ${window.as('minutes')}분)`);
  for (const row of report.rows) {
    lines.push(formatShareRow(row));
  }
  lines.push('');

  lines.push('## 지수');
  lines.push(`All Share Index: ${report.index === null ? UNAVAILABLE : report.index.toFixed(4)}`);
  lines.push('');

  lines.push('='.repeat(60));
  lines.push('');

  return lines.join('\n');
}
