import { describe, it, expect } from 'vitest';
import { getEnv } from '../src/env.js';

describe('getEnv', () => {
  it('PARLEY_ 접두사 변수를 반환한다', () => {
    expect(getEnv('STATE_DIR', { PARLEY_STATE_DIR: '/srv/parley' })).toBe('/srv/parley');
  });

  it('접두사 없는 같은 이름은 보지 않는다', () => {
    expect(getEnv('STATE_DIR', { STATE_DIR: '/srv/other' })).toBeUndefined();
  });

  it('빈 문자열은 미설정으로 본다', () => {
    expect(getEnv('STATE_DIR', { PARLEY_STATE_DIR: '' })).toBeUndefined();
  });

  it('env를 생략하면 process.env를 읽는다', () => {
    process.env.PARLEY_ENV_TEST = 'from-process';
    try {
      expect(getEnv('ENV_TEST')).toBe('from-process');
    } finally {
      delete process.env.PARLEY_ENV_TEST;
    }
  });
});
