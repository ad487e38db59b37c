// packages/server/src/gateway/registry.ts
import { EventEmitter } from 'node:events';
import type { Snowflake, Topic } from '@parley/types';
import { ParleyError, getEventBus, type ParleyLogger } from '@parley/infra';
import type { FrameTransport, GatewaySession } from './session.js';

/** 세션 등록 해제 사유 */
export type UnregisterReason = 'closed' | 'expired' | 'invalidated' | 'shutdown';

/** 레지스트리 이벤트 */
export type RegistryEvent =
  | { readonly type: 'session_registered'; readonly session: GatewaySession }
  | { readonly type: 'session_detached'; readonly sessionId: string; readonly reason: string }
  | { readonly type: 'session_resumed'; readonly sessionId: string }
  | {
      readonly type: 'session_unregistered';
      readonly sessionId: string;
      readonly userId: Snowflake;
      readonly reason: UnregisterReason;
    }
  | {
      readonly type: 'invariant_violation';
      readonly message: string;
      readonly details: Record<string, unknown>;
    };

export interface SessionRegistryOptions {
  /** 분리된 세션이 resume을 기다리는 시간 */
  readonly resumeTtlMs: number;
  readonly logger?: ParleyLogger;
}

/** 토픽 인덱스 키 */
export function topicKey(topic: Topic): string {
  return `${topic.kind}:${topic.key}`;
}

/**
 * 세션 레지스트리
 *
 * - 세션 ID → 세션, 사용자 → 세션들, 토픽 → 구독 세션들 인덱스
 * - 모든 연산은 동기 -- 이벤트 루프 위에서 중간 상태가 보이지 않는다
 * - 분리(detach)된 세션은 resumeTtlMs 동안 구독을 유지하며 이벤트를 버퍼링
 * - 토픽 인덱스에 남은 미등록 세션 ID는 불변식 위반으로 보고하고 복구
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, GatewaySession>();
  private readonly byUser = new Map<Snowflake, Set<string>>();
  private readonly byTopic = new Map<string, Set<string>>();
  private readonly subscriptions = new Map<string, Map<string, Topic>>();
  private readonly expiryTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly emitter = new EventEmitter();
  private readonly resumeTtlMs: number;
  private readonly logger?: ParleyLogger;

  constructor(opts: SessionRegistryOptions) {
    this.resumeTtlMs = opts.resumeTtlMs;
    this.logger = opts.logger;
  }

  /** 세션 등록 */
  register(session: GatewaySession): void {
    if (this.sessions.has(session.id)) {
      throw new ParleyError(`Session already registered: ${session.id}`, 'SESSION_EXISTS', {
        isOperational: false,
      });
    }
    this.sessions.set(session.id, session);
    this.subscriptions.set(session.id, new Map());

    let userSessions = this.byUser.get(session.userId);
    if (!userSessions) {
      userSessions = new Set();
      this.byUser.set(session.userId, userSessions);
    }
    userSessions.add(session.id);

    this.emit({ type: 'session_registered', session });
  }

  /** 세션 제거 -- 모든 구독과 resume 기록을 함께 지운다 */
  unregister(sessionId: string, reason: UnregisterReason = 'closed'): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }

    this.clearExpiry(sessionId);

    for (const key of this.subscriptions.get(sessionId)?.keys() ?? []) {
      this.removeFromTopic(key, sessionId);
    }
    this.subscriptions.delete(sessionId);

    const userSessions = this.byUser.get(session.userId);
    userSessions?.delete(sessionId);
    if (userSessions?.size === 0) {
      this.byUser.delete(session.userId);
    }

    this.sessions.delete(sessionId);
    session.detachTransport();
    session.clearReplay();

    this.emit({ type: 'session_unregistered', sessionId, userId: session.userId, reason });
    return true;
  }

  /** 토픽 구독 (멱등). 미등록 세션이면 false */
  subscribe(sessionId: string, topic: Topic): boolean {
    const subs = this.subscriptions.get(sessionId);
    if (!subs) {
      return false;
    }
    const key = topicKey(topic);
    subs.set(key, topic);

    let members = this.byTopic.get(key);
    if (!members) {
      members = new Set();
      this.byTopic.set(key, members);
    }
    members.add(sessionId);
    return true;
  }

  /** 토픽 구독 해제. 구독 중이 아니었으면 false */
  unsubscribe(sessionId: string, topic: Topic): boolean {
    const key = topicKey(topic);
    const removed = this.subscriptions.get(sessionId)?.delete(key) ?? false;
    this.removeFromTopic(key, sessionId);
    return removed;
  }

  /** 사용자의 모든 세션을 토픽에 구독. 구독된 세션 수 반환 */
  subscribeUser(
    userId: Snowflake,
    topic: Topic,
    filter?: (session: GatewaySession) => boolean,
  ): number {
    let count = 0;
    for (const session of this.sessionsForUser(userId)) {
      if (filter && !filter(session)) {
        continue;
      }
      if (this.subscribe(session.id, topic)) {
        count++;
      }
    }
    return count;
  }

  /** 사용자의 모든 세션을 토픽에서 해제 */
  unsubscribeUser(userId: Snowflake, topic: Topic): number {
    let count = 0;
    for (const session of this.sessionsForUser(userId)) {
      if (this.unsubscribe(session.id, topic)) {
        count++;
      }
    }
    return count;
  }

  /** 토픽의 모든 구독 제거 (길드 삭제 등). 해제된 세션 ID 반환 */
  dropTopic(topic: Topic): string[] {
    const key = topicKey(topic);
    const members = [...(this.byTopic.get(key) ?? [])];
    for (const sessionId of members) {
      this.subscriptions.get(sessionId)?.delete(key);
    }
    this.byTopic.delete(key);
    return members;
  }

  /** 토픽 구독 세션 목록 (스냅샷) */
  sessionsFor(topic: Topic): GatewaySession[] {
    const key = topicKey(topic);
    const members = this.byTopic.get(key);
    if (!members) {
      return [];
    }

    const result: GatewaySession[] = [];
    for (const sessionId of [...members]) {
      const session = this.sessions.get(sessionId);
      if (session) {
        result.push(session);
        continue;
      }
      // 미등록 세션을 가리키는 인덱스 -- 복구하고 계속 진행
      this.removeFromTopic(key, sessionId);
      this.reportViolation('Topic index references unknown session', { topic: key, sessionId });
    }
    return result;
  }

  /** 사용자의 모든 세션 (연결/분리 무관) */
  sessionsForUser(userId: Snowflake): GatewaySession[] {
    const ids = this.byUser.get(userId);
    if (!ids) {
      return [];
    }
    const result: GatewaySession[] = [];
    for (const id of ids) {
      const session = this.sessions.get(id);
      if (session) {
        result.push(session);
      }
    }
    return result;
  }

  /** 세션의 구독 토픽 목록 */
  subscriptionsOf(sessionId: string): Topic[] {
    return [...(this.subscriptions.get(sessionId)?.values() ?? [])];
  }

  isSubscribed(sessionId: string, topic: Topic): boolean {
    return this.subscriptions.get(sessionId)?.has(topicKey(topic)) ?? false;
  }

  get(sessionId: string): GatewaySession | undefined {
    return this.sessions.get(sessionId);
  }

  /** 모든 세션 목록 */
  list(): GatewaySession[] {
    return [...this.sessions.values()];
  }

  /**
   * 물리 연결 분리 -- 세션은 구독을 유지한 채 resume을 기다린다.
   * resumeTtlMs가 지나면 만료되어 등록 해제된다.
   */
  detach(sessionId: string, reason: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.detachTransport();

    if (!this.expiryTimers.has(sessionId)) {
      const timer = setTimeout(() => this.expire(sessionId), this.resumeTtlMs);
      timer.unref();
      this.expiryTimers.set(sessionId, timer);
    }

    this.emit({ type: 'session_detached', sessionId, reason });
    getEventBus().emit('gateway:session:detached', sessionId, reason);
    return true;
  }

  /** 분리된 세션에 새 연결을 붙인다. 세션이 없으면 undefined */
  reattach(sessionId: string, transport: FrameTransport): GatewaySession | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }
    this.clearExpiry(sessionId);
    session.attach(transport);
    this.emit({ type: 'session_resumed', sessionId });
    return session;
  }

  /** 등록된 세션 수 */
  get size(): number {
    return this.sessions.size;
  }

  /** 분리 상태 세션 수 */
  get detachedCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!session.attached) {
        count++;
      }
    }
    return count;
  }

  /** 이벤트 리스너 등록. 해제 함수 반환. */
  on(listener: (event: RegistryEvent) => void): () => void {
    this.emitter.on('event', listener);
    return () => this.emitter.off('event', listener);
  }

  /** 리소스 해제 */
  dispose(): void {
    for (const sessionId of [...this.sessions.keys()]) {
      this.unregister(sessionId, 'shutdown');
    }
    this.byTopic.clear();
    this.emitter.removeAllListeners();
  }

  private expire(sessionId: string): void {
    this.expiryTimers.delete(sessionId);
    const session = this.sessions.get(sessionId);
    if (!session || session.attached) {
      return;
    }
    this.logger?.debug(`Session ${sessionId} expired without resume`);
    this.unregister(sessionId, 'expired');
    getEventBus().emit('gateway:session:expired', sessionId);
  }

  private clearExpiry(sessionId: string): void {
    const timer = this.expiryTimers.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.expiryTimers.delete(sessionId);
    }
  }

  private removeFromTopic(key: string, sessionId: string): void {
    const members = this.byTopic.get(key);
    if (!members) {
      return;
    }
    members.delete(sessionId);
    if (members.size === 0) {
      this.byTopic.delete(key);
    }
  }

  private reportViolation(message: string, details: Record<string, unknown>): void {
    this.logger?.error(`Invariant violation: ${message}`, details);
    getEventBus().emit('gateway:invariant', message, details);
    this.emit({ type: 'invariant_violation', message, details });
  }

  private emit(event: RegistryEvent): void {
    this.emitter.emit('event', event);
  }
}
