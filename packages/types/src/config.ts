import type { LogLevel } from './common.js';

/** 루트 설정 타입 */
export interface ParleyConfig {
  gateway?: GatewayConfig;
  auth?: AuthConfig;
  rateLimits?: Record<string, RateLimitClassConfig>;
  directory?: DirectoryConfig;
  logging?: LoggingConfig;
  meta?: ConfigMeta;
}

export interface GatewayConfig {
  port?: number;
  host?: string;
  /** GET /gateway 응답으로 알려줄 공개 ws URL */
  publicUrl?: string;
  corsOrigins?: string[];
  heartbeatIntervalMs?: number;
  identifyTimeoutMs?: number;
  resumeTtlMs?: number;
  maxBufferedEvents?: number;
  maxPayloadBytes?: number;
  maxBufferedBytes?: number;
  maxConnections?: number;
  maxGuildsPerShard?: number;
}

export interface AuthConfig {
  jwtSecret?: string;
  apiKeys?: string[];
}

export interface RateLimitClassConfig {
  limit: number;
  windowMs: number;
  /** true면 거부가 강제 (상태 변경 액션) */
  mutating?: boolean;
  /** 한도에 도달하면 윈도우와 무관하게 이 시간 동안 거부 */
  blockMs?: number;
}

export interface DirectoryConfig {
  snapshotPath?: string;
}

export interface LoggingConfig {
  level?: LogLevel;
  file?: boolean;
  redactSensitive?: boolean;
}

export interface ConfigMeta {
  lastTouchedVersion?: string;
  lastTouchedAt?: string;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}

/** 기본값 적용 후 설정 -- 서버가 직접 소비하는 형태 */
export interface ResolvedConfig {
  gateway: Required<Omit<GatewayConfig, 'publicUrl'>> & { publicUrl?: string };
  auth: { jwtSecret?: string; apiKeys: string[] };
  rateLimits: Record<string, RateLimitClassConfig>;
  directory: DirectoryConfig;
  logging: Required<LoggingConfig>;
  meta?: ConfigMeta;
}
