// packages/server/src/gateway/types.ts
import type { RateLimitClassConfig } from '@parley/types';

// === 인증 타입 ===

/** HTTP 인증 레벨 */
export type AuthLevel =
  | 'none' // 공개 (health, gateway)
  | 'api_key' // API 키 (프로세스 외부 협력자)
  | 'token'; // JWT 토큰 (사용자)

/** 인증 정보 */
export interface AuthInfo {
  readonly level: AuthLevel;
  readonly clientId?: string;
  readonly userId?: string;
}

/** 인증 결과 */
export type AuthResult =
  | { readonly ok: true; readonly info: AuthInfo }
  | { readonly ok: false; readonly error: string; readonly code: number };

// === 서버 설정 ===

/** 게이트웨이 서버 상세 설정 */
export interface GatewayServerConfig {
  readonly host: string;
  readonly port: number;
  /** GET /gateway 응답 URL. 없으면 ws://host:port */
  readonly publicUrl?: string;
  readonly cors?: {
    readonly origins: readonly string[];
    readonly maxAge?: number;
  };
  readonly auth: {
    readonly apiKeys: readonly string[];
    readonly jwtSecret: string;
  };
  readonly ws: {
    readonly heartbeatIntervalMs: number;
    readonly identifyTimeoutMs: number;
    readonly maxPayloadBytes: number;
    readonly maxBufferedBytes: number;
    readonly maxConnections: number;
  };
  readonly sessions: {
    readonly resumeTtlMs: number;
    readonly maxBufferedEvents: number;
    readonly maxGuildsPerShard: number;
  };
  readonly rateLimits: Readonly<Record<string, RateLimitClassConfig>>;
}
