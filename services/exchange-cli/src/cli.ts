#!/usr/bin/env node
import { Command } from 'commander';
import { createLogger, envNumber } from '@workspace/shared-utils';
import { DEFAULT_VWAP_WINDOW_MINUTES, createSampleExchange } from '@workspace/exchange-core';
import {
  buildMarketReport,
  formatMarketReport,
  parsePositiveNumber,
  windowFromMinutes,
} from './report.js';

const logger = createLogger('exchange-cli');
const program = new Command();

program
  .name('exchange')
  .description('GBCE 샘플 거래소 지표 CLI')
  .version('0.1.0');

/**
 * 명령 실행 + 실패 시 에러 로그와 종료 코드 설정
 */
function run(command: string, action: () => void) {
  try {
    action();
  } catch (error) {
    logger.error(`${command} 명령 실패`, error);
    process.exitCode = 1;
  }
}

function resolveWindow(raw: string | undefined) {
  const minutes =
    raw === undefined
      ? envNumber('VWAP_WINDOW_MINUTES', DEFAULT_VWAP_WINDOW_MINUTES)
      : parsePositiveNumber(raw, 'VWAP 구간(분)');
  return windowFromMinutes(minutes);
}

/**
 * 전체 리포트
 */
program
  .command('report')
  .description('샘플 종목별 배당 수익률, P/E, VWAP과 All Share Index 출력')
  .option('--price <price>', '모든 종목에 적용할 기준 가격 (기본값: 마지막 체결 가격)')
  .option('--window <minutes>', 'VWAP 구간 (분, 기본값: VWAP_WINDOW_MINUTES 또는 15)')
  .action((options: { price?: string; window?: string }) => {
    run('report', () => {
      const window = resolveWindow(options.window);
      const price = options.price === undefined ? undefined : parsePositiveNumber(options.price, '가격');

      const report = buildMarketReport(createSampleExchange(), { price, window });
      console.log(formatMarketReport(report, window));
    });
  });

program
  .command('yield')
  .description('배당 수익률')
  .argument('<symbol>', '종목 심볼')
  .argument('<price>', '현재 가격')
  .action((symbol: string, rawPrice: string) => {
    run('yield', () => {
      const share = createSampleExchange().requireShare(symbol);
      const price = parsePositiveNumber(rawPrice, '가격');
      console.log(`${share.symbol} 배당 수익률: ${share.dividendYield(price).toFixed(4)}`);
    });
  });

program
  .command('pe')
  .description('P/E 비율')
  .argument('<symbol>', '종목 심볼')
  .argument('<price>', '현재 가격')
  .action((symbol: string, rawPrice: string) => {
    run('pe', () => {
      const share = createSampleExchange().requireShare(symbol);
      const price = parsePositiveNumber(rawPrice, '가격');
      console.log(`${share.symbol} P/E: ${share.peRatio(price).toFixed(2)}`);
    });
  });

program
  .command('vwap')
  .description('거래량 가중 평균 가격')
  .argument('<symbol>', '종목 심볼')
  .option('--window <minutes>', 'VWAP 구간 (분)')
  .action((symbol: string, options: { window?: string }) => {
    run('vwap', () => {
      const share = createSampleExchange().requireShare(symbol);
      const vwap = share.volumeWeightedPrice({ window: resolveWindow(options.window) });
      console.log(`${share.symbol} VWAP: ${vwap.toFixed(2)}`);
    });
  });

program
  .command('index')
  .description('All Share Index')
  .action(() => {
    run('index', () => {
      console.log(`All Share Index: ${createSampleExchange().allShareIndex().toFixed(4)}`);
    });
  });

program.parse();
