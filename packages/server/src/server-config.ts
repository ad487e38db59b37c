// packages/server/src/server-config.ts
import type { ResolvedConfig } from '@parley/types';
import { ConfigError } from '@parley/config';
import type { GatewayServerConfig } from './gateway/types.js';

/** 검증된 설정 → 게이트웨이 서버 설정 */
export function toGatewayServerConfig(config: ResolvedConfig): GatewayServerConfig {
  const { gateway, auth } = config;
  if (!auth.jwtSecret) {
    throw new ConfigError('auth.jwtSecret is required to start the gateway', {
      details: { path: 'auth.jwtSecret' },
    });
  }
  return {
    host: gateway.host,
    port: gateway.port,
    ...(gateway.publicUrl !== undefined && { publicUrl: gateway.publicUrl }),
    cors: { origins: gateway.corsOrigins, maxAge: 600 },
    auth: { apiKeys: auth.apiKeys, jwtSecret: auth.jwtSecret },
    ws: {
      heartbeatIntervalMs: gateway.heartbeatIntervalMs,
      identifyTimeoutMs: gateway.identifyTimeoutMs,
      maxPayloadBytes: gateway.maxPayloadBytes,
      maxBufferedBytes: gateway.maxBufferedBytes,
      maxConnections: gateway.maxConnections,
    },
    sessions: {
      resumeTtlMs: gateway.resumeTtlMs,
      maxBufferedEvents: gateway.maxBufferedEvents,
      maxGuildsPerShard: gateway.maxGuildsPerShard,
    },
    rateLimits: config.rateLimits,
  };
}
