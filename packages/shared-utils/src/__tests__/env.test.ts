import { describe, it, expect, afterEach } from 'vitest';
import { env, envNumber } from '../env.js';

const KEY = 'EXCHANGE_TEST_VALUE';

describe('env helpers', () => {
  afterEach(() => {
    delete process.env[KEY];
  });

  it('env는 미설정 시 undefined', () => {
    expect(env(KEY)).toBeUndefined();
  });

  it('envNumber는 숫자로 변환해야 함', () => {
    process.env[KEY] = '30';
    expect(envNumber(KEY, 15)).toBe(30);
  });

  it('envNumber는 미설정 시 기본값 반환', () => {
    expect(envNumber(KEY, 15)).toBe(15);
  });

  it('envNumber는 숫자가 아니면 에러를 던져야 함', () => {
    process.env[KEY] = 'fifteen';
    expect(() => envNumber(KEY, 15)).toThrow(`Environment variable ${KEY} must be a number, got: fifteen`);
  });
});
