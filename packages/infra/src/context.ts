// packages/infra/src/context.ts
import { AsyncLocalStorage } from 'node:async_hooks';

/** 로그 컨텍스트 -- HTTP 요청 하나 또는 게이트웨이 프레임 하나 */
export interface RequestContext {
  /** HTTP 요청 ID 또는 WebSocket 연결 ID */
  requestId: string;
  /** 프레임을 처리하는 게이트웨이 세션 (IDENTIFY/RESUME 이후) */
  sessionId?: string;
  userId?: string;
  startedAt: number;
}

const als = new AsyncLocalStorage<RequestContext>();

/** 컨텍스트를 주입하고 콜백 실행 */
export function runWithContext<T>(ctx: RequestContext, fn: () => T): T {
  return als.run(ctx, fn);
}

/** 현재 컨텍스트 조회 (없으면 undefined) */
export function getContext(): RequestContext | undefined {
  return als.getStore();
}

/**
 * 처리 중인 프레임이 세션을 만들거나 되찾으면 현재 컨텍스트에 기록.
 * 같은 프레임의 이후 로그부터 세션/사용자 ID가 붙는다.
 */
export function bindSession(sessionId: string, userId: string): void {
  const ctx = als.getStore();
  if (ctx) {
    ctx.sessionId = sessionId;
    ctx.userId = userId;
  }
}

/** 로그에 붙일 컨텍스트 필드. 값이 없는 필드는 생략 */
export function contextFields(): Record<string, string> | undefined {
  const ctx = als.getStore();
  if (!ctx) {
    return undefined;
  }
  const fields: Record<string, string> = { requestId: ctx.requestId };
  if (ctx.sessionId !== undefined) {
    fields.sessionId = ctx.sessionId;
  }
  if (ctx.userId !== undefined) {
    fields.userId = ctx.userId;
  }
  return fields;
}
