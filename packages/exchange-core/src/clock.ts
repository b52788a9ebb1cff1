import { DateTime, type Duration } from 'luxon';
import type { Clock } from './types.js';

export const systemClock: Clock = {
  now: () => DateTime.utc(),
};

export interface ManualClock extends Clock {
  set(instant: DateTime): void;
  advance(by: Duration): DateTime;
}

/**
 * 수동으로 움직이는 시계 (테스트/시드 데이터용)
 *
 * @example
 * ```typescript
 * const clock = createManualClock(DateTime.fromISO('2025-01-02T09:00:00Z'));
 * share.recordTrade(100, 'buy', 110);
 * clock.advance(Duration.fromObject({ minutes: 5 }));
 * ```
 */
export function createManualClock(start: DateTime = DateTime.utc()): ManualClock {
  let current = start;

  return {
    now: () => current,
    set(instant: DateTime) {
      current = instant;
    },
    advance(by: Duration) {
      current = current.plus(by);
      return current;
    },
  };
}
