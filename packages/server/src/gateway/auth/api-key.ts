// packages/server/src/gateway/auth/api-key.ts
import { createHash, timingSafeEqual } from 'node:crypto';
import type { AuthResult } from '../types.js';

/**
 * POST /dispatch 호출자 API 키 인증
 *
 * - 키와 허용 키를 SHA-256 해시해 timingSafeEqual로 비교 (길이 동일)
 * - 일치해도 나머지 허용 키까지 모두 비교 -- 몇 번째 키인지 응답 시간에 드러나지 않는다
 * - clientId는 rest-dispatch 속도 제한 주체이자 로그 식별자. 키 원문은 어디에도 남기지 않는다
 */
export function validateApiKey(key: string, allowedKeys: readonly string[]): AuthResult {
  if (key.length === 0) {
    return { ok: false, error: 'Invalid API key', code: 401 };
  }

  const keyHash = sha256(key);
  let found = false;
  for (const allowed of allowedKeys) {
    found = timingSafeEqual(keyHash, sha256(allowed)) || found;
  }

  if (!found) {
    return { ok: false, error: 'Invalid API key', code: 401 };
  }

  return {
    ok: true,
    info: { level: 'api_key', clientId: apiKeyClientId(key) },
  };
}

/** API 키의 공개 식별자 (해시 앞 8자리) */
export function apiKeyClientId(key: string): string {
  return sha256(key).toString('hex').slice(0, 8);
}

function sha256(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}
