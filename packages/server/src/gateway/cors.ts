// packages/server/src/gateway/cors.ts
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { GatewayServerConfig } from './types.js';

type CorsConfig = GatewayServerConfig['cors'];

/** 브라우저 클라이언트가 GET /gateway 응답에서 읽는 속도 제한 헤더 */
const EXPOSED_HEADERS = 'X-RateLimit-Limit, X-RateLimit-Remaining, X-RateLimit-Reset-After, Retry-After';

const ALLOWED_HEADERS = 'Content-Type, Authorization, X-API-Key';

/**
 * CORS 헤더 설정 + OPTIONS preflight 응답
 *
 * - 허용 origin만 반사, `*` 설정이면 `*` (쿠키 인증이 없어 credentials는 허용하지 않음)
 * - Allow-Methods는 요청 경로에 등록된 메서드만
 * - preflight는 origin 허용 여부와 무관하게 204로 끝낸다 (불허면 CORS 헤더 없음)
 */
export function handleCors(
  req: IncomingMessage,
  res: ServerResponse,
  config: CorsConfig,
  methods: readonly string[],
): void {
  const origin = req.headers.origin;
  const allowed = origin !== undefined && config !== undefined && isAllowedOrigin(origin, config);

  if (allowed) {
    if (config.origins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Expose-Headers', EXPOSED_HEADERS);
  }

  if (req.method !== 'OPTIONS') {
    return;
  }

  if (allowed) {
    res.setHeader('Access-Control-Allow-Methods', [...methods, 'OPTIONS'].join(', '));
    res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
    if (config.maxAge) {
      res.setHeader('Access-Control-Max-Age', String(config.maxAge));
    }
  }
  res.writeHead(204);
  res.end();
}

function isAllowedOrigin(origin: string, config: NonNullable<CorsConfig>): boolean {
  return config.origins.includes('*') || config.origins.includes(origin);
}
