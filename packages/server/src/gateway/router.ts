// packages/server/src/gateway/router.ts
import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod/v4';
import type { DispatchResult, GatewayStatus } from '@parley/types';
import { authenticate, isAuthBlocked, recordAuthFailure } from './auth/index.js';
import type { GatewayRuntime } from './context.js';
import { handleCors } from './cors.js';
import type { RateLimitDecision } from './rate-limit/limiter.js';

interface Route {
  readonly method: string;
  readonly path: string;
  handler(req: IncomingMessage, res: ServerResponse, rt: GatewayRuntime): Promise<void>;
}

/** 서버 버전 (GET /health) */
export const SERVER_VERSION = '0.1.0';

/** POST /dispatch body 최대 크기 */
const MAX_BODY_BYTES = 1024 * 1024;

/** 게이트웨이가 직접 만드는 이벤트 -- 외부에서 발행 불가 */
const RESERVED_EVENTS: ReadonlySet<string> = new Set(['READY', 'RESUMED', 'RATE_LIMITED']);

const snowflake = z.string().regex(/^\d{1,20}$/);

const DispatchBodySchema = z
  .strictObject({
    kind: z.enum(['guild', 'channel', 'user', 'friend', 'lazy-member-list']),
    key: snowflake.optional(),
    keys: z.array(snowflake).min(1).max(1000).optional(),
    event: z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'event must be UPPER_SNAKE_CASE'),
    data: z.unknown(),
    channel_id: snowflake.optional(),
    unique: z.boolean().optional(),
  })
  .refine((body) => (body.key === undefined) !== (body.keys === undefined), {
    message: 'exactly one of key or keys is required',
  });

const routes: Route[] = [
  { method: 'GET', path: '/health', handler: handleHealthRequest },
  { method: 'GET', path: '/gateway', handler: handleGatewayRequest },
  { method: 'POST', path: '/dispatch', handler: handleDispatchRequest },
];

/** HTTP 요청을 적절한 핸들러로 라우팅 */
export async function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  rt: GatewayRuntime,
): Promise<void> {
  // 라우트 매칭 (쿼리 스트링 제외)
  const path = (req.url ?? '/').split('?')[0];
  const methods = routes.filter((r) => r.path === path).map((r) => r.method);
  if (methods.length === 0) {
    sendJson(res, 404, { error: 'Not Found' });
    return;
  }

  // CORS 헤더 (OPTIONS면 preflight 응답까지)
  handleCors(req, res, rt.config.cors, methods);
  if (req.method === 'OPTIONS') {
    return;
  }

  const route = routes.find((r) => r.method === req.method && r.path === path);
  if (!route) {
    sendJson(res, 404, { error: 'Not Found' });
    return;
  }

  try {
    await route.handler(req, res, rt);
  } catch (err) {
    rt.logger.error(`HTTP ${req.method} ${path} failed: ${String(err)}`);
    sendJson(res, 500, { error: 'Internal Server Error' });
  }
}

/** GET /health -- 헬스 체크 */
async function handleHealthRequest(
  _req: IncomingMessage,
  res: ServerResponse,
  rt: GatewayRuntime,
): Promise<void> {
  const status: GatewayStatus = {
    uptime: process.uptime(),
    connections: rt.connections.size,
    sessions: rt.registry.size,
    detachedSessions: rt.registry.detachedCount,
    version: SERVER_VERSION,
  };
  sendJson(res, 200, { status: 'ok', ...status });
}

/** GET /gateway -- 접속 URL. global 클래스는 권고용 (거부돼도 응답) */
async function handleGatewayRequest(
  req: IncomingMessage,
  res: ServerResponse,
  rt: GatewayRuntime,
): Promise<void> {
  const decision = rt.rateLimiter.check(req.socket.remoteAddress ?? 'unknown', 'global');
  setRateLimitHeaders(res, decision);

  const url = rt.config.publicUrl ?? `ws://${rt.config.host}:${rt.config.port}`;
  sendJson(res, 200, { url });
}

/** POST /dispatch -- 프로세스 외부 협력자의 이벤트 발행 (X-API-Key) */
async function handleDispatchRequest(
  req: IncomingMessage,
  res: ServerResponse,
  rt: GatewayRuntime,
): Promise<void> {
  const ip = req.socket.remoteAddress ?? 'unknown';
  if (isAuthBlocked(rt.rateLimiter, ip)) {
    sendJson(res, 429, { error: 'Too many authentication failures' });
    return;
  }
  const auth = authenticate(req, rt.config.auth);
  if (!auth.ok) {
    recordAuthFailure(rt.rateLimiter, ip);
    sendJson(res, auth.code, { error: auth.error });
    return;
  }
  if (auth.info.level !== 'api_key') {
    sendJson(res, 401, { error: 'API key required' });
    return;
  }

  const decision = rt.rateLimiter.check(auth.info.clientId ?? 'unknown', 'rest-dispatch');
  setRateLimitHeaders(res, decision);
  if (!decision.allowed) {
    sendJson(res, 429, {
      error: 'Rate limited',
      retry_after_ms: Math.ceil(decision.retryAfterMs),
    });
    return;
  }

  let body: string;
  try {
    body = await readBody(req, MAX_BODY_BYTES);
  } catch (err) {
    const tooLarge = err instanceof BodyTooLargeError;
    if (tooLarge) {
      // 남은 body를 읽지 않았으므로 연결을 재사용하지 않는다
      res.setHeader('Connection', 'close');
    }
    sendJson(res, tooLarge ? 413 : 400, {
      error: tooLarge ? 'Payload too large' : 'Failed to read request body',
    });
    return;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    sendJson(res, 400, { error: 'Invalid JSON' });
    return;
  }

  const parsed = DispatchBodySchema.safeParse(raw);
  if (!parsed.success) {
    sendJson(res, 400, {
      error: 'Invalid dispatch body',
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
    return;
  }

  const { kind, key, keys, event, data, channel_id, unique } = parsed.data;
  if (RESERVED_EVENTS.has(event)) {
    sendJson(res, 400, { error: `Reserved event: ${event}` });
    return;
  }

  let result: DispatchResult;
  if (key !== undefined) {
    result = rt.dispatcher.dispatch(kind, key, event, data, { channelId: channel_id });
  } else {
    result = rt.dispatcher.dispatchMany(kind, keys ?? [], event, () => data, { unique });
  }

  sendJson(res, 200, result);
}

function setRateLimitHeaders(res: ServerResponse, decision: RateLimitDecision): void {
  res.setHeader('X-RateLimit-Limit', String(decision.actionClass.limit));
  if (decision.allowed) {
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    res.setHeader('X-RateLimit-Reset-After', (decision.resetAfterMs / 1000).toFixed(3));
    return;
  }
  res.setHeader('X-RateLimit-Remaining', '0');
  res.setHeader('Retry-After', String(Math.ceil(decision.retryAfterMs / 1000)));
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/** body 크기 초과 */
export class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

/** 요청 body 읽기 (스트리밍, 크기 제한) */
export function readBody(req: IncomingMessage, maxBytes = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > maxBytes) {
        // 한도를 넘으면 더 읽지 않는다
        req.off('data', onData);
        req.pause();
        reject(new BodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    };
    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}
