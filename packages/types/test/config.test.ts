import type { ParleyConfig, ConfigValidationIssue, RateLimitClassConfig } from '@parley/types';
import { describe, it, expect, expectTypeOf } from 'vitest';

describe('ParleyConfig', () => {
  it('빈 객체가 유효한 ParleyConfig이다 (모든 필드 optional)', () => {
    const config: ParleyConfig = {};
    expectTypeOf(config).toMatchTypeOf<ParleyConfig>();
  });

  it('gateway, auth, rateLimits 등 최상위 필드를 가질 수 있다', () => {
    const config: ParleyConfig = {
      gateway: { port: 18790, host: 'localhost', heartbeatIntervalMs: 41_250 },
      auth: { jwtSecret: 'test-secret' },
      rateLimits: { identify: { limit: 2, windowMs: 5000, mutating: true } },
      logging: { level: 'info' },
    };
    expectTypeOf(config).toMatchTypeOf<ParleyConfig>();
  });
});

describe('RateLimitClassConfig', () => {
  it('limit과 windowMs는 필수이다', () => {
    expectTypeOf<RateLimitClassConfig>().toHaveProperty('limit');
    expectTypeOf<RateLimitClassConfig>().toHaveProperty('windowMs');
  });
});

describe('ConfigValidationIssue', () => {
  it('severity가 error 또는 warning이다', () => {
    const issue: ConfigValidationIssue = {
      path: 'gateway.port',
      message: 'Invalid port',
      severity: 'error',
    };
    expect(['error', 'warning']).toContain(issue.severity);
  });
});
