// packages/server/src/gateway/ws/connection.ts
import { randomBytes, randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { RawData, WebSocket } from 'ws';
import {
  GATEWAY_CLOSE_CODES,
  GATEWAY_OPCODES,
  type GatewayCloseCode,
  type GatewayOpcode,
  type IdentifyPayload,
  type HelloPayload,
  type RateLimitedPayload,
  type ResumePayload,
  type Snowflake,
} from '@parley/types';
import {
  bindSession,
  extractErrorInfo,
  getEventBus,
  runWithContext,
  type ParleyLogger,
} from '@parley/infra';
import type { GatewayRuntime } from '../context.js';
import { CLOSE_REASONS, GatewayCloseError, isGatewayCloseError, isResumableCloseCode } from '../errors.js';
import {
  decodeFrame,
  encodeFrame,
  serializePayload,
  truncateCloseReason,
  type InboundFrame,
} from '../protocol/codec.js';
import type { RateLimitDecision } from '../rate-limit/limiter.js';
import { buildReadyPayload } from '../ready.js';
import { GatewaySession, type FrameTransport } from '../session.js';
import { guildsForShard, parseShard } from '../sharding.js';
import { isAuthBlocked, recordAuthFailure } from '../auth/index.js';
import { validateToken } from '../auth/token.js';
import { HeartbeatMonitor } from './heartbeat.js';

/** 연결 상태 */
export type ConnectionState = 'connecting' | 'awaiting-identify' | 'resuming' | 'ready' | 'closed';

/** 클라이언트가 보낸 정상 종료 코드 -- 세션을 즉시 폐기한다 */
const CLIENT_TERMINAL_CODES: ReadonlySet<number> = new Set([
  GATEWAY_CLOSE_CODES.NORMAL,
  GATEWAY_CLOSE_CODES.GOING_AWAY,
]);

/**
 * 물리 WebSocket 연결 하나의 상태 머신
 *
 * connecting → awaiting-identify → ready → (resuming → ready) → closed
 *
 * - 모든 프레임 처리는 동기식 -- 디스패처와 같은 이벤트 루프 턴 안에서
 *   레지스트리가 중간 상태로 보이지 않는다
 * - closed 전이에서 타이머 해제와 세션 분리/폐기가 함께 일어난다
 * - 예상치 못한 예외는 로그 후 4000으로 닫는다 (프로세스로 전파하지 않음)
 */
export class GatewayConnection implements FrameTransport {
  readonly id = randomUUID();
  /** HELLO에 실어 보내는 일회성 연결 토큰 */
  readonly nonce = randomBytes(16).toString('hex');
  readonly connectedAt = Date.now();

  private state: ConnectionState = 'connecting';
  private session: GatewaySession | null = null;
  private identifyTimer: ReturnType<typeof setTimeout> | undefined;
  private readonly heartbeat: HeartbeatMonitor;
  private readonly logger: ParleyLogger;

  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string,
    private readonly rt: GatewayRuntime,
  ) {
    this.logger = rt.logger.child('connection');
    this.heartbeat = new HeartbeatMonitor(rt.config.ws.heartbeatIntervalMs, () => {
      this.close(GATEWAY_CLOSE_CODES.SESSION_TIMED_OUT);
    });
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get sessionId(): string | undefined {
    return this.session?.id;
  }

  get userId(): Snowflake | undefined {
    return this.session?.userId;
  }

  /** HELLO 전송 후 IDENTIFY/RESUME 대기 */
  start(): void {
    this.rt.connections.set(this.id, this);
    getEventBus().emit('gateway:ws:connect', this.id, this.remoteAddress);

    // 프레임 처리 중 로그에 연결/세션 ID 주입
    this.ws.on('message', (data: RawData, isBinary: boolean) => {
      runWithContext(
        {
          requestId: this.id,
          sessionId: this.sessionId,
          userId: this.userId,
          startedAt: Date.now(),
        },
        () => this.handleMessage(data, isBinary),
      );
    });
    this.ws.on('close', (code: number) => {
      this.handleTransportClose(code);
    });
    this.ws.on('error', (err: Error) => {
      this.logger.warn(`WebSocket error on ${this.id}: ${err.message}`);
    });

    const hello: HelloPayload = {
      heartbeat_interval: this.rt.config.ws.heartbeatIntervalMs,
      nonce: this.nonce,
    };
    this.sendControl(GATEWAY_OPCODES.HELLO, hello);
    this.state = 'awaiting-identify';
    this.heartbeat.start();
    this.identifyTimer = setTimeout(() => {
      this.identifyTimer = undefined;
      if (this.state === 'awaiting-identify') {
        this.close(GATEWAY_CLOSE_CODES.AUTHENTICATION_TIMEOUT);
      }
    }, this.rt.config.ws.identifyTimeoutMs);
  }

  // ─── FrameTransport ───

  /** 송신 버퍼가 포화되면 보내지 않고 4000으로 닫는다 (세션은 resume 가능) */
  sendFrame(frame: string): 'sent' | 'saturated' {
    if (this.state === 'closed' || this.ws.readyState !== this.ws.OPEN) {
      return 'saturated';
    }
    if (this.ws.bufferedAmount > this.rt.config.ws.maxBufferedBytes) {
      this.logger.warn(`Outbound buffer saturated on ${this.id} (${this.ws.bufferedAmount} bytes)`);
      this.close(GATEWAY_CLOSE_CODES.UNKNOWN_ERROR, 'Outbound buffer saturated');
      return 'saturated';
    }
    this.ws.send(frame);
    return 'sent';
  }

  // ─── 종료 ───

  /** 서버측 종료. closed 전이 안에서 세션을 분리하거나 폐기한다 */
  close(code: GatewayCloseCode, reason?: string): void {
    if (this.state === 'closed') {
      return;
    }
    this.enterClosed(isResumableCloseCode(code), `server close ${code}`);
    this.ws.close(code, truncateCloseReason(reason ?? CLOSE_REASONS[code]));
    getEventBus().emit('gateway:ws:disconnect', this.id, code);
  }

  /** 서버 종료: RECONNECT 후 1001 */
  shutdown(): void {
    if (this.state === 'closed') {
      return;
    }
    this.sendControl(GATEWAY_OPCODES.RECONNECT, null);
    this.close(GATEWAY_CLOSE_CODES.GOING_AWAY, 'Server shutting down');
  }

  // ─── 인바운드 ───

  private handleMessage(data: RawData, isBinary: boolean): void {
    if (this.state === 'closed') {
      return;
    }
    try {
      // HELLO nonce가 연결 단위 속도 제한 주체
      const decision = this.rt.rateLimiter.check(this.nonce, 'gateway-messages');
      if (!decision.allowed) {
        throw new GatewayCloseError(GATEWAY_CLOSE_CODES.RATE_LIMITED, 'Too many frames', {
          details: { retryAfterMs: decision.retryAfterMs },
        });
      }
      this.handleFrame(decodeFrame(data, isBinary, this.rt.config.ws.maxPayloadBytes));
    } catch (err) {
      this.fail(err);
    }
  }

  private handleFrame(frame: InboundFrame): void {
    switch (frame.op) {
      case GATEWAY_OPCODES.HEARTBEAT:
        this.onHeartbeat(frame.d);
        return;
      case GATEWAY_OPCODES.IDENTIFY:
        this.assertNotAuthenticated();
        this.onIdentify(frame.d);
        return;
      case GATEWAY_OPCODES.RESUME:
        this.assertNotAuthenticated();
        this.onResume(frame.d);
        return;
      case GATEWAY_OPCODES.PRESENCE_UPDATE: {
        const session = this.requireSession();
        if (this.gate(frame.op, 'presence-update', session.userId)) {
          this.rt.presence.update(session, frame.d);
        }
        return;
      }
      case GATEWAY_OPCODES.REQUEST_GUILD_MEMBERS: {
        const session = this.requireSession();
        if (this.gate(frame.op, 'request-guild-members', session.userId)) {
          this.rt.memberList.requestMembers(session, frame.d);
        }
        return;
      }
      case GATEWAY_OPCODES.LAZY_REQUEST: {
        const session = this.requireSession();
        if (this.gate(frame.op, 'lazy-request', session.userId)) {
          this.rt.memberList.subscribe(session, frame.d);
        }
        return;
      }
      default: {
        const exhaustive: never = frame;
        throw new GatewayCloseError(GATEWAY_CLOSE_CODES.UNKNOWN_OPCODE, undefined, {
          details: { frame: exhaustive },
        });
      }
    }
  }

  private onHeartbeat(seq: number | null): void {
    this.heartbeat.beat();
    if (this.session) {
      this.session.lastAckSeq = seq;
    }
    this.sendControl(GATEWAY_OPCODES.HEARTBEAT_ACK, null);
  }

  private onIdentify(payload: IdentifyPayload): void {
    const { config, registry, directory, membership, presence } = this.rt;
    const userId = this.authenticateToken(payload.token);

    for (const actionClass of ['identify', 'session-start']) {
      const decision = this.rt.rateLimiter.check(userId, actionClass);
      if (!decision.allowed) {
        throw new GatewayCloseError(GATEWAY_CLOSE_CODES.RATE_LIMITED, undefined, {
          details: { actionClass, retryAfterMs: decision.retryAfterMs },
        });
      }
    }

    const shard = parseShard(payload.shard);
    const guildIds = guildsForShard(
      directory.getUserGuildIds(userId),
      shard,
      config.sessions.maxGuildsPerShard,
    );

    const session = new GatewaySession({
      userId,
      shard,
      maxBufferedEvents: config.sessions.maxBufferedEvents,
      presence: payload.presence,
      largeThreshold: payload.large_threshold,
    });

    this.clearIdentifyTimer();
    registry.register(session);
    membership.subscribeSession(session, guildIds);
    session.attach(this);
    this.session = session;
    bindSession(session.id, session.userId);
    this.state = 'ready';

    const ready = buildReadyPayload(directory, session, guildIds, (peerId) =>
      presence.current(peerId),
    );
    session.sendUnsequenced('READY', serializePayload(ready), 0);
    getEventBus().emit('gateway:session:ready', session.id, userId);
    this.logger.info(`Session ${session.id} ready for user ${userId} (shard ${shard.id}/${shard.count})`);

    if (session.attached) {
      presence.announce(session);
    }
  }

  private onResume(payload: ResumePayload): void {
    this.state = 'resuming';
    const userId = this.authenticateToken(payload.token);
    const { registry, presence } = this.rt;
    const session = registry.get(payload.session_id);

    if (!session || session.attached) {
      this.invalidSession(session ? 'session attached elsewhere' : 'unknown session');
      return;
    }
    if (session.userId !== userId) {
      this.noteAuthFailure('session owner mismatch');
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.AUTHENTICATION_FAILED);
    }
    if (payload.seq > session.seq) {
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.INVALID_SEQ, undefined, {
        details: { seq: payload.seq, latest: session.seq },
      });
    }

    const events = session.replayAfter(payload.seq);
    if (events === null) {
      // 버퍼가 일부를 버렸다 -- 부분 재생 대신 세션 폐기
      registry.unregister(session.id, 'invalidated');
      this.invalidSession('replay buffer overflowed');
      return;
    }

    this.clearIdentifyTimer();
    registry.reattach(session.id, this);
    this.session = session;
    bindSession(session.id, session.userId);
    this.state = 'ready';

    // 놓친 PRESENCE_UPDATE는 PRESENCE_REPLACE 하나로 묶는다
    const presences: string[] = [];
    for (const event of events) {
      if (event.eventType === 'PRESENCE_UPDATE') {
        presences.push(event.data);
      } else if (this.sendFrame(event.frame) === 'saturated') {
        return;
      }
    }
    if (presences.length > 0) {
      if (session.deliver('PRESENCE_REPLACE', `[${presences.join(',')}]`) === 'saturated') {
        return;
      }
    }
    session.sendUnsequenced('RESUMED', serializePayload({ replayed: events.length }));
    getEventBus().emit('gateway:session:resumed', session.id, events.length);
    this.logger.info(`Session ${session.id} resumed, replayed ${events.length} events`);

    presence.restore(session);
  }

  /** 토큰 검증 후 사용자 ID. 실패는 IP별로 기록 */
  private authenticateToken(token: string): Snowflake {
    if (isAuthBlocked(this.rt.rateLimiter, this.remoteAddress)) {
      throw new GatewayCloseError(
        GATEWAY_CLOSE_CODES.RATE_LIMITED,
        'Too many authentication failures',
      );
    }
    const result = validateToken(token, this.rt.config.auth.jwtSecret);
    if (!result.ok) {
      this.noteAuthFailure(result.error);
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.AUTHENTICATION_FAILED);
    }
    const userId = result.info.userId;
    if (userId === undefined || !this.rt.directory.getUser(userId)) {
      this.noteAuthFailure('unknown user');
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.AUTHENTICATION_FAILED);
    }
    return userId;
  }

  private noteAuthFailure(reason: string): void {
    getEventBus().emit('gateway:auth:failure', this.remoteAddress, reason);
    recordAuthFailure(this.rt.rateLimiter, this.remoteAddress);
  }

  private invalidSession(reason: string): void {
    this.logger.debug(`Invalid session on ${this.id}: ${reason}`);
    this.sendControl(GATEWAY_OPCODES.INVALID_SESSION, false);
    this.state = 'awaiting-identify';
  }

  /**
   * 속도 제한 확인. 거부 시 RATE_LIMITED 힌트를 보낸다.
   * 변경 클래스는 거부 시 적용하지 않고, 조회 클래스는 힌트만 주고 계속 처리한다.
   */
  private gate(op: GatewayOpcode, actionClass: string, actor: string): boolean {
    const decision = this.rt.rateLimiter.check(actor, actionClass);
    if (decision.allowed) {
      return true;
    }
    this.sendRateLimited(op, decision);
    return !decision.actionClass.mutating;
  }

  private sendRateLimited(
    op: GatewayOpcode,
    decision: Extract<RateLimitDecision, { allowed: false }>,
  ): void {
    const payload: RateLimitedPayload = {
      opcode: op,
      retry_after_ms: Math.ceil(decision.retryAfterMs),
      meta: { action_class: decision.actionClass.name },
    };
    this.session?.sendUnsequenced('RATE_LIMITED', serializePayload(payload));
  }

  private assertNotAuthenticated(): void {
    if (this.state === 'ready') {
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.ALREADY_AUTHENTICATED);
    }
  }

  private requireSession(): GatewaySession {
    if (this.state !== 'ready' || !this.session) {
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.NOT_AUTHENTICATED);
    }
    return this.session;
  }

  // ─── 내부 ───

  private fail(err: unknown): void {
    if (isGatewayCloseError(err)) {
      this.logger.debug(`Closing ${this.id} with ${err.closeCode}: ${err.message}`);
      this.close(err.closeCode, err.message);
      return;
    }
    const info = extractErrorInfo(err);
    this.logger.error(`Unexpected error on ${this.id}: ${info.message}`, info);
    this.close(GATEWAY_CLOSE_CODES.UNKNOWN_ERROR);
  }

  /** 클라이언트/네트워크가 끊은 경우. 1000/1001만 세션 폐기 */
  private handleTransportClose(code: number): void {
    if (this.state === 'closed') {
      return;
    }
    this.enterClosed(!CLIENT_TERMINAL_CODES.has(code), `client close ${code}`);
    getEventBus().emit('gateway:ws:disconnect', this.id, code);
  }

  private enterClosed(resumable: boolean, reason: string): void {
    this.state = 'closed';
    this.heartbeat.stop();
    this.clearIdentifyTimer();
    this.rt.connections.delete(this.id);

    const session = this.session;
    this.session = null;
    if (!session || session.transportId !== this.id) {
      return;
    }
    if (resumable) {
      this.rt.registry.detach(session.id, reason);
    } else {
      this.rt.registry.unregister(session.id, 'closed');
    }
  }

  private clearIdentifyTimer(): void {
    if (this.identifyTimer) {
      clearTimeout(this.identifyTimer);
      this.identifyTimer = undefined;
    }
  }

  private sendControl(op: GatewayOpcode, d: unknown): void {
    if (this.ws.readyState === this.ws.OPEN) {
      this.ws.send(encodeFrame(op, d));
    }
  }
}

/** 새 WebSocket 연결 처리 */
export function handleWsConnection(
  ws: WebSocket,
  req: IncomingMessage,
  rt: GatewayRuntime,
): GatewayConnection {
  const conn = new GatewayConnection(ws, req.socket.remoteAddress ?? 'unknown', rt);
  conn.start();
  return conn;
}
