/**
 * 거래소 계산 에러 클래스
 */

export type ExchangeErrorCode =
  | 'INVALID_ARGUMENT'
  | 'DIVISION_UNDEFINED'
  | 'NO_TRADES_IN_WINDOW'
  | 'NO_TRADES'
  | 'UNSUPPORTED_CATEGORY'
  | 'SHARE_NOT_FOUND';

export class ExchangeError extends Error {
  code: ExchangeErrorCode;

  constructor(code: ExchangeErrorCode, message: string) {
    super(message);
    this.name = 'ExchangeError';
    this.code = code;
  }
}

export class InvalidArgumentError extends ExchangeError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_ARGUMENT', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidArgumentError';
    this.issues = issues;
  }
}

export class DivisionUndefinedError extends ExchangeError {
  symbol: string;

  constructor(symbol: string) {
    super('DIVISION_UNDEFINED', `[${symbol}] 최근 배당금이 0이므로 P/E 비율을 정의할 수 없습니다`);
    this.name = 'DivisionUndefinedError';
    this.symbol = symbol;
  }
}

export class NoTradesInWindowError extends ExchangeError {
  symbol: string;
  windowMs: number;

  constructor(symbol: string, windowMs: number) {
    super('NO_TRADES_IN_WINDOW', `[${symbol}] 최근 ${Math.round(windowMs / 1000)}초 이내 체결이 없습니다`);
    this.name = 'NoTradesInWindowError';
    this.symbol = symbol;
    this.windowMs = windowMs;
  }
}

export class NoTradesError extends ExchangeError {
  constructor() {
    super('NO_TRADES', '거래소 전체에 체결이 없어 지수를 계산할 수 없습니다');
    this.name = 'NoTradesError';
  }
}

export class UnsupportedCategoryError extends ExchangeError {
  category: string;

  constructor(category: string) {
    super('UNSUPPORTED_CATEGORY', `지원하지 않는 종목 구분: ${category}`);
    this.name = 'UnsupportedCategoryError';
    this.category = category;
  }
}

export class ShareNotFoundError extends ExchangeError {
  symbol: string;

  constructor(symbol: string) {
    super('SHARE_NOT_FOUND', `등록되지 않은 종목: ${symbol}`);
    this.name = 'ShareNotFoundError';
    this.symbol = symbol;
  }
}
