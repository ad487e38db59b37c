// packages/server/src/gateway/auth/index.ts
import type { IncomingMessage } from 'node:http';
import { getEventBus } from '@parley/infra';
import type { RateLimiter } from '../rate-limit/limiter.js';
import type { AuthResult, GatewayServerConfig } from '../types.js';
import { validateApiKey } from './api-key.js';
import { validateToken } from './token.js';

/**
 * HTTP 요청의 인증 정보를 추출하고 검증한다.
 * (WebSocket은 IDENTIFY/RESUME 페이로드의 토큰으로 인증)
 *
 * 우선순위: Bearer token > X-API-Key > none
 */
export function authenticate(
  req: IncomingMessage,
  config: GatewayServerConfig['auth'],
): AuthResult {
  const authorization = req.headers.authorization;
  const apiKeyHeader = req.headers['x-api-key'];
  const apiKey = typeof apiKeyHeader === 'string' ? apiKeyHeader : undefined;
  const ip = req.socket.remoteAddress ?? 'unknown';

  // Bearer 토큰 인증
  if (authorization?.startsWith('Bearer ')) {
    const token = authorization.slice(7);
    const result = validateToken(token, config.jwtSecret);
    if (!result.ok) {
      getEventBus().emit('gateway:auth:failure', ip, result.error);
    }
    return result;
  }

  // API 키 인증
  if (apiKey) {
    const result = validateApiKey(apiKey, config.apiKeys);
    if (!result.ok) {
      getEventBus().emit('gateway:auth:failure', ip, result.error);
    }
    return result;
  }

  // 인증 없음 (public 엔드포인트만 접근 가능)
  return { ok: true, info: { level: 'none' } };
}

/** 원격 IP별 인증 실패 속도 제한 클래스 */
export const AUTH_FAILURE_CLASS = 'auth-failure';

/** IP가 인증 실패로 차단 중인지 */
export function isAuthBlocked(limiter: RateLimiter, ip: string): boolean {
  return limiter.isLimited(ip, AUTH_FAILURE_CLASS);
}

/** 인증 실패 1회 기록. 한도에 닿는 순간 gateway:auth:rate_limit */
export function recordAuthFailure(limiter: RateLimiter, ip: string): void {
  const decision = limiter.check(ip, AUTH_FAILURE_CLASS);
  if (decision.allowed && decision.remaining === 0) {
    getEventBus().emit('gateway:auth:rate_limit', ip, decision.actionClass.limit);
  }
}

/** re-export for convenience */
export { validateApiKey } from './api-key.js';
export { validateToken } from './token.js';
