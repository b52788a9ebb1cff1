import { Duration } from 'luxon';
import type { ShareCategory, TradeAction } from './types.js';

export const SHARE_CATEGORIES = ['Common', 'Preferred'] as const satisfies readonly ShareCategory[];

export const TRADE_ACTIONS = ['buy', 'sell'] as const satisfies readonly TradeAction[];

/** VWAP 기본 조회 구간 */
export const DEFAULT_VWAP_WINDOW_MINUTES = 15;

export const DEFAULT_VWAP_WINDOW = Duration.fromObject({ minutes: DEFAULT_VWAP_WINDOW_MINUTES });
