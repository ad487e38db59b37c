// packages/server/src/gateway/auth/token.ts
import { createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod/v4';
import type { AuthResult } from '../types.js';

const HeaderSchema = z.object({ alg: z.string().optional() });

/** IDENTIFY 토큰 클레임 -- sub는 사용자 snowflake */
const ClaimsSchema = z.object({
  sub: z.unknown(),
  clientId: z.string().optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
});

type ClaimsResult = { ok: true; claims: z.infer<typeof ClaimsSchema> } | { ok: false };

/**
 * IDENTIFY/Bearer 토큰 검증 (HS256 전용)
 *
 * 1. 3-part dot-separated 형식
 * 2. alg는 HS256만 (alg confusion 차단)
 * 3. 서명은 timingSafeEqual로 비교
 * 4. exp/nbf (초 단위)
 * 5. sub는 사용자 snowflake
 */
export function validateToken(token: string, secret: string, now = Date.now()): AuthResult {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split('.');
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return { ok: false, error: 'Invalid token format', code: 401 };
  }

  const header = HeaderSchema.safeParse(decodeSegment(headerB64));
  if (!header.success) {
    return { ok: false, error: 'Invalid token header', code: 401 };
  }
  if (header.data.alg !== 'HS256') {
    return { ok: false, error: `Unsupported algorithm: ${header.data.alg}`, code: 401 };
  }

  const expected = createHmac('sha256', secret).update(`${headerB64}.${payloadB64}`).digest();
  const actual = Buffer.from(signatureB64, 'base64url');
  if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
    return { ok: false, error: 'Invalid token signature', code: 401 };
  }

  const parsed = parseClaims(payloadB64);
  if (!parsed.ok) {
    return { ok: false, error: 'Invalid token payload', code: 401 };
  }
  const { claims } = parsed;

  const nowSec = now / 1000;
  if (claims.exp !== undefined && claims.exp < nowSec) {
    return { ok: false, error: 'Token expired', code: 401 };
  }
  if (claims.nbf !== undefined && claims.nbf > nowSec) {
    return { ok: false, error: 'Token not yet valid', code: 401 };
  }

  if (typeof claims.sub !== 'string' || !/^\d{1,20}$/.test(claims.sub)) {
    return { ok: false, error: 'Token subject must be a user id', code: 401 };
  }

  return {
    ok: true,
    info: {
      level: 'token',
      userId: claims.sub,
      ...(claims.clientId !== undefined && { clientId: claims.clientId }),
    },
  };
}

function parseClaims(segment: string): ClaimsResult {
  const result = ClaimsSchema.safeParse(decodeSegment(segment));
  return result.success ? { ok: true, claims: result.data } : { ok: false };
}

/** base64url JSON 세그먼트 디코드. 실패하면 undefined (스키마 검증에서 걸러짐) */
function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
}
