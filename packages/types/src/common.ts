/** 브랜드 타입 -- 원시 타입에 의미론적 구분 부여 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** 스노우플레이크 ID (10진수 문자열) */
export type Snowflake = string;

/** 게이트웨이 세션 ID (resume 토큰) */
export type SessionId = Brand<string, 'SessionId'>;

/**
 * 비동기 정리 함수 -- TC39 `Symbol.asyncDispose`와 이름 충돌 방지를 위해
 * `AsyncDisposable` 대신 `CleanupFn`으로 명명.
 */
export type CleanupFn = () => Promise<void>;

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** 브랜드 타입 팩토리 */
export function createSessionId(id: string): SessionId {
  return id as SessionId;
}
