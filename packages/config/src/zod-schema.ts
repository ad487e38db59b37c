// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

/** 게이트웨이 설정 스키마 */
const GatewaySchema = z.strictObject({
  port: z.number().int().min(1).max(65535),
  host: z.string(),
  publicUrl: z.string(),
  corsOrigins: z.array(z.string()),
  heartbeatIntervalMs: z.number().int().min(1000),
  identifyTimeoutMs: z.number().int().min(100),
  resumeTtlMs: z.number().int().min(0),
  maxBufferedEvents: z.number().int().min(1),
  maxPayloadBytes: z.number().int().min(256),
  maxBufferedBytes: z.number().int().min(1024),
  maxConnections: z.number().int().min(1),
  maxGuildsPerShard: z.number().int().min(1),
});

/** 인증 설정 스키마 */
const AuthSchema = z.strictObject({
  jwtSecret: z.string().min(8),
  apiKeys: z.array(z.string().min(1)),
});

/** 액션 클래스별 속도 제한 스키마 */
const RateLimitClassSchema = z.strictObject({
  limit: z.number().int().min(1),
  windowMs: z.number().int().min(1),
  mutating: z.boolean().optional(),
  blockMs: z.number().int().min(1).optional(),
});

/** 로깅 설정 스키마 */
const LoggingSchema = z.strictObject({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  file: z.boolean(),
  redactSensitive: z.boolean(),
});

/**
 * 루트 설정 스키마
 *
 * - z.strictObject() 사용: 알 수 없는 키 감지 (오타 방지)
 * - 모든 최상위 섹션은 optional (빈 {} 허용)
 * - .default()는 사용하지 않음 -- defaults.ts에서 별도 적용
 */
export const ParleyConfigSchema = z.strictObject({
  gateway: GatewaySchema.partial().optional(),
  auth: AuthSchema.partial().optional(),
  rateLimits: z.record(z.string(), RateLimitClassSchema).optional(),
  directory: z.strictObject({ snapshotPath: z.string() }).partial().optional(),
  logging: LoggingSchema.partial().optional(),
  meta: z
    .strictObject({
      lastTouchedVersion: z.string().optional(),
      lastTouchedAt: z.string().optional(),
    })
    .optional(),
});

export type ValidatedParleyConfig = z.infer<typeof ParleyConfigSchema>;
