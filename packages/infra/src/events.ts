// packages/infra/src/events.ts
import { EventEmitter } from 'node:events';

/**
 * 이벤트 맵 타입 -- 이벤트명 → 핸들러 시그니처 매핑
 *
 * 사용 예:
 * ```typescript
 * interface MyEvents {
 *   'user:login': (userId: string) => void;
 *   'error': (err: Error) => void;
 * }
 * const emitter = createTypedEmitter<MyEvents>();
 * ```
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** 타입 안전 EventEmitter 래퍼 */
export interface TypedEmitter<T extends { [K in keyof T]: (...args: never[]) => void }> {
  on<K extends keyof T & string>(event: K, listener: T[K]): this;
  off<K extends keyof T & string>(event: K, listener: T[K]): this;
  once<K extends keyof T & string>(event: K, listener: T[K]): this;
  emit<K extends keyof T & string>(event: K, ...args: Parameters<T[K]>): boolean;
  removeAllListeners<K extends keyof T & string>(event?: K): this;
  listenerCount<K extends keyof T & string>(event: K): number;
}

/** TypedEmitter 팩토리 */
export function createTypedEmitter<
  T extends { [K in keyof T]: (...args: never[]) => void },
>(): TypedEmitter<T> {
  return new EventEmitter() as unknown as TypedEmitter<T>;
}

/** 시스템 이벤트 맵 */
export interface ParleyEventMap {
  /** 시스템 초기화 완료 */
  'system:ready': () => void;
  /** 시스템 종료 시작 */
  'system:shutdown': (reason: string) => void;
  /** 미처리 rejection */
  'system:unhandledRejection': (level: string, reason: unknown) => void;
  /** 설정 변경 */
  'config:change': (changedPaths: string[]) => void;

  // ── Gateway ──
  'gateway:start': (port: number) => void;
  'gateway:stop': () => void;
  'gateway:ws:connect': (connectionId: string, remoteAddress: string) => void;
  'gateway:ws:disconnect': (connectionId: string, code: number) => void;
  'gateway:session:ready': (sessionId: string, userId: string) => void;
  'gateway:session:resumed': (sessionId: string, replayed: number) => void;
  'gateway:session:detached': (sessionId: string, reason: string) => void;
  'gateway:session:expired': (sessionId: string) => void;
  'gateway:dispatch': (
    kind: string,
    key: string,
    eventType: string,
    delivered: number,
    skipped: number,
  ) => void;
  'gateway:ratelimit': (actionClass: string, actor: string, retryAfterMs: number) => void;
  'gateway:auth:failure': (remoteAddress: string, reason: string) => void;
  'gateway:auth:rate_limit': (remoteAddress: string, failures: number) => void;
  'gateway:invariant': (message: string, details: Record<string, unknown>) => void;
}

/** 전역 이벤트 버스 (싱글턴) */
let globalBus: TypedEmitter<ParleyEventMap> | undefined;

export function getEventBus(): TypedEmitter<ParleyEventMap> {
  if (!globalBus) {
    globalBus = createTypedEmitter<ParleyEventMap>();
  }
  return globalBus;
}

/** 테스트용 이벤트 버스 초기화 */
export function resetEventBus(): void {
  globalBus?.removeAllListeners();
  globalBus = undefined;
}
