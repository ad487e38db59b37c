// packages/config/src/defaults.ts
import type { ParleyConfig, RateLimitClassConfig, ResolvedConfig } from '@parley/types';

/**
 * 액션 클래스 기본 한도
 *
 * mutating 클래스의 거부는 강제, 나머지는 권고(재시도 힌트만 반환).
 */
const DEFAULT_RATE_LIMITS: Readonly<Record<string, RateLimitClassConfig>> = Object.freeze({
  identify: { limit: 2, windowMs: 5_000, mutating: true },
  'session-start': { limit: 1000, windowMs: 4 * 60 * 60 * 1000, mutating: true },
  'presence-update': { limit: 5, windowMs: 60_000, mutating: true },
  'gateway-messages': { limit: 120, windowMs: 60_000, mutating: true },
  'request-guild-members': { limit: 10, windowMs: 10_000, mutating: false },
  'lazy-request': { limit: 20, windowMs: 10_000, mutating: false },
  'rest-dispatch': { limit: 50, windowMs: 1_000, mutating: true },
  global: { limit: 50, windowMs: 1_000, mutating: false },
  // 원격 IP별 인증 실패: 5분 내 5회면 15분 차단
  'auth-failure': { limit: 5, windowMs: 5 * 60_000, mutating: true, blockMs: 15 * 60_000 },
});

/**
 * 불변 기본값
 *
 * Zod .default()를 쓰지 않는 이유: 파이프라인에서 명시적 단계로 분리.
 */
const DEFAULTS = Object.freeze({
  gateway: {
    port: 18790,
    host: '127.0.0.1',
    corsOrigins: [],
    heartbeatIntervalMs: 41_250,
    identifyTimeoutMs: 10_000,
    resumeTtlMs: 30_000,
    maxBufferedEvents: 1000,
    maxPayloadBytes: 4096,
    maxBufferedBytes: 1024 * 1024, // 1MB
    maxConnections: 10_000,
    maxGuildsPerShard: 2500,
  },
  auth: {
    apiKeys: [],
  },
  rateLimits: DEFAULT_RATE_LIMITS,
  directory: {},
  logging: {
    level: 'info' as const,
    file: false,
    redactSensitive: true,
  },
}) satisfies ResolvedConfig;

/** 기본값을 유저 설정에 병합 (섹션 단위, 유저 값 우선) */
export function applyDefaults(userConfig: ParleyConfig): ResolvedConfig {
  return {
    ...userConfig,
    gateway: { ...DEFAULTS.gateway, ...userConfig.gateway },
    auth: { ...DEFAULTS.auth, ...userConfig.auth },
    rateLimits: { ...DEFAULTS.rateLimits, ...userConfig.rateLimits },
    directory: { ...DEFAULTS.directory, ...userConfig.directory },
    logging: { ...DEFAULTS.logging, ...userConfig.logging },
  };
}

/** 기본값 조회 (읽기 전용) */
export function getDefaults(): Readonly<ResolvedConfig> {
  return DEFAULTS;
}
