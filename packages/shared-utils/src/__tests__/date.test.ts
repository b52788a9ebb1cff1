import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { nowIso, toIsoString } from '../date.js';

describe('date', () => {
  it('nowIso는 UTC ISO 문자열을 반환해야 함', () => {
    expect(nowIso()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('toIsoString은 UTC로 변환해야 함', () => {
    expect(toIsoString('2025-01-02T18:00:00+09:00')).toBe('2025-01-02T09:00:00.000Z');
    expect(toIsoString(DateTime.fromISO('2025-01-02T09:00:00Z', { zone: 'utc' }))).toBe(
      '2025-01-02T09:00:00.000Z'
    );
  });

  it('잘못된 입력은 에러를 던져야 함', () => {
    expect(() => toIsoString('not-a-date')).toThrow('ISO 변환 실패');
  });
});
