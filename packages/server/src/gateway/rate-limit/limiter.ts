// packages/server/src/gateway/rate-limit/limiter.ts
import type { RateLimitClassConfig } from '@parley/types';
import { ParleyError, getEventBus } from '@parley/infra';

interface Bucket {
  windowStart: number;
  count: number;
  /** blockMs 클래스가 한도에 도달한 뒤의 차단 종료 시각 */
  blockedUntil?: number;
}

/** 액션 클래스 (기본값 적용 후) */
export interface ActionClass {
  readonly name: string;
  readonly limit: number;
  readonly windowMs: number;
  readonly mutating: boolean;
  /** 0이면 차단 없음 */
  readonly blockMs: number;
}

export type RateLimitDecision =
  | {
      readonly allowed: true;
      readonly actionClass: ActionClass;
      readonly remaining: number;
      readonly resetAfterMs: number;
    }
  | {
      readonly allowed: false;
      readonly actionClass: ActionClass;
      readonly retryAfterMs: number;
    };

/** 단조 시계 (ms) */
export type MonotonicClock = () => number;

export interface RateLimiterOptions {
  readonly classes: Readonly<Record<string, RateLimitClassConfig>>;
  readonly clock?: MonotonicClock;
  /** 만료 버킷 정리 주기. 0이면 타이머 없음 */
  readonly sweepIntervalMs?: number;
}

/** 알 수 없는 액션 클래스이고 global 폴백도 없을 때 */
export class UnknownActionClassError extends ParleyError {
  constructor(actionClass: string) {
    super(`Unknown rate limit class: ${actionClass}`, 'UNKNOWN_RATE_LIMIT_CLASS', {
      isOperational: false,
      details: { actionClass },
    });
    this.name = 'UnknownActionClassError';
  }
}

const FALLBACK_CLASS = 'global';

/**
 * (actor, action class)별 고정 윈도우 카운터
 *
 * - check()는 확인과 증가를 한 번에 수행 (이벤트 루프 위에서 원자적)
 * - 거부는 버킷을 건드리지 않는다
 * - 만료된 윈도우는 허용 결정 시점에만 새 윈도우로 교체되므로
 *   경계에 걸친 버스트는 결정이 반환된 윈도우에만 계산된다
 * - blockMs가 있는 클래스는 한도에 도달하면 blockMs 동안 거부 (예: auth-failure)
 * - 시간 계산은 performance.now() 기반 단조 시계
 */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly classes = new Map<string, ActionClass>();
  private readonly clock: MonotonicClock;
  private readonly sweepTimer: ReturnType<typeof setInterval> | undefined;

  constructor(opts: RateLimiterOptions) {
    for (const [name, cls] of Object.entries(opts.classes)) {
      this.classes.set(name, {
        name,
        limit: cls.limit,
        windowMs: cls.windowMs,
        mutating: cls.mutating ?? true,
        blockMs: cls.blockMs ?? 0,
      });
    }
    this.clock = opts.clock ?? (() => performance.now());

    const sweepIntervalMs = opts.sweepIntervalMs ?? 60_000;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** 액션 클래스 조회 (없으면 global) */
  classFor(actionClass: string): ActionClass {
    const cls = this.classes.get(actionClass) ?? this.classes.get(FALLBACK_CLASS);
    if (!cls) {
      throw new UnknownActionClassError(actionClass);
    }
    return cls;
  }

  /** 허용이면 카운트를 1 올리고, 거부면 아무것도 바꾸지 않는다 */
  check(actor: string, actionClass: string): RateLimitDecision {
    const cls = this.classFor(actionClass);
    const key = `${cls.name}:${actor}`;
    const now = this.clock();
    const bucket = this.buckets.get(key);

    if (bucket?.blockedUntil !== undefined && now < bucket.blockedUntil) {
      const retryAfterMs = bucket.blockedUntil - now;
      getEventBus().emit('gateway:ratelimit', cls.name, actor, retryAfterMs);
      return { allowed: false, actionClass: cls, retryAfterMs };
    }

    if (!bucket || this.expired(bucket, cls, now)) {
      const fresh: Bucket = { windowStart: now, count: 1 };
      this.buckets.set(key, fresh);
      this.blockIfExhausted(fresh, cls, now);
      return {
        allowed: true,
        actionClass: cls,
        remaining: cls.limit - 1,
        resetAfterMs: cls.windowMs,
      };
    }

    const resetAfterMs = bucket.windowStart + cls.windowMs - now;

    if (bucket.count >= cls.limit) {
      getEventBus().emit('gateway:ratelimit', cls.name, actor, resetAfterMs);
      return { allowed: false, actionClass: cls, retryAfterMs: resetAfterMs };
    }

    bucket.count++;
    this.blockIfExhausted(bucket, cls, now);
    return {
      allowed: true,
      actionClass: cls,
      remaining: cls.limit - bucket.count,
      resetAfterMs,
    };
  }

  /** 다음 check()가 거부될지 (카운트하지 않음) */
  isLimited(actor: string, actionClass: string): boolean {
    const cls = this.classFor(actionClass);
    const bucket = this.buckets.get(`${cls.name}:${actor}`);
    if (!bucket) {
      return false;
    }
    const now = this.clock();
    if (bucket.blockedUntil !== undefined) {
      return now < bucket.blockedUntil;
    }
    return !this.expired(bucket, cls, now) && bucket.count >= cls.limit;
  }

  /** actor의 버킷 제거 (actionClass 생략 시 모든 클래스) */
  reset(actor: string, actionClass?: string): void {
    if (actionClass !== undefined) {
      this.buckets.delete(`${this.classFor(actionClass).name}:${actor}`);
      return;
    }
    const suffix = `:${actor}`;
    for (const key of this.buckets.keys()) {
      if (key.endsWith(suffix) && this.classes.has(key.slice(0, -suffix.length))) {
        this.buckets.delete(key);
      }
    }
  }

  /** 만료 버킷 정리. 제거된 수 반환 */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      const name = key.slice(0, key.indexOf(':'));
      const cls = this.classes.get(name);
      if (!cls || this.expired(bucket, cls, now)) {
        this.buckets.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** 윈도우가 지났고 차단 중도 아님 */
  private expired(bucket: Bucket, cls: ActionClass, now: number): boolean {
    if (bucket.blockedUntil !== undefined) {
      return now >= bucket.blockedUntil;
    }
    return now - bucket.windowStart >= cls.windowMs;
  }

  private blockIfExhausted(bucket: Bucket, cls: ActionClass, now: number): void {
    if (cls.blockMs > 0 && bucket.count >= cls.limit) {
      bucket.blockedUntil = now + cls.blockMs;
    }
  }

  /** 활성 버킷 수 */
  get size(): number {
    return this.buckets.size;
  }

  /** 리소스 해제 */
  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
    this.buckets.clear();
  }
}
