// packages/config/test/zod-schema.test.ts
import { describe, it, expect } from 'vitest';
import { ParleyConfigSchema } from '../src/zod-schema.js';

describe('ParleyConfigSchema', () => {
  it('빈 객체를 허용한다', () => {
    const result = ParleyConfigSchema.safeParse({});
    expect(result.success).toBe(true);
  });

  it('유효한 전체 설정을 허용한다', () => {
    const config = {
      gateway: {
        port: 18790,
        host: 'localhost',
        publicUrl: 'ws://localhost:18790/gateway',
        heartbeatIntervalMs: 41_250,
        identifyTimeoutMs: 10_000,
        resumeTtlMs: 30_000,
        maxBufferedEvents: 500,
        maxPayloadBytes: 4096,
      },
      auth: { jwtSecret: 'test-secret', apiKeys: ['test-api-key'] },
      rateLimits: {
        identify: { limit: 2, windowMs: 5000, mutating: true },
        'auth-failure': { limit: 5, windowMs: 300_000, blockMs: 900_000 },
      },
      directory: { snapshotPath: '~/parley/directory.json' },
      logging: { level: 'info' as const, file: true },
      meta: { lastTouchedVersion: '0.1.0' },
    };
    const result = ParleyConfigSchema.safeParse(config);
    expect(result.success).toBe(true);
  });

  it('알 수 없는 키를 거부한다 (strictObject)', () => {
    const result = ParleyConfigSchema.safeParse({ gatway: {} });
    expect(result.success).toBe(false);
  });

  it('잘못된 포트 범위를 거부한다', () => {
    const result = ParleyConfigSchema.safeParse({ gateway: { port: 99999 } });
    expect(result.success).toBe(false);
  });

  it('너무 짧은 heartbeat 간격을 거부한다', () => {
    const result = ParleyConfigSchema.safeParse({ gateway: { heartbeatIntervalMs: 10 } });
    expect(result.success).toBe(false);
  });

  it('짧은 jwtSecret을 거부한다', () => {
    const result = ParleyConfigSchema.safeParse({ auth: { jwtSecret: 'short' } });
    expect(result.success).toBe(false);
  });

  it('속도 제한 클래스에 알 수 없는 키를 거부한다', () => {
    const result = ParleyConfigSchema.safeParse({
      rateLimits: { identify: { limit: 2, windowMs: 5000, burst: 3 } },
    });
    expect(result.success).toBe(false);
  });

  it('잘못된 로그 레벨을 거부한다', () => {
    const result = ParleyConfigSchema.safeParse({ logging: { level: 'verbose' } });
    expect(result.success).toBe(false);
  });
});
