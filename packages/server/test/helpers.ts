// packages/server/test/helpers.ts
import { createHmac } from 'node:crypto';
import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import type { WebSocket } from 'ws';
import { vi } from 'vitest';
import type { DirectorySnapshot, GatewayFrame } from '@parley/types';
import type { ParleyLogger } from '@parley/infra';
import { getDefaults } from '@parley/config';
import { createGatewayRuntime, type GatewayRuntime } from '../src/gateway/context.js';
import { InMemoryDirectory } from '../src/gateway/directory/memory.js';
import type { GatewayServerConfig } from '../src/gateway/types.js';
import { GatewaySession, type FrameTransport } from '../src/gateway/session.js';
import { GatewayConnection } from '../src/gateway/ws/connection.js';

export const TEST_SECRET = 'test-secret';
export const TEST_API_KEY = 'test-key';

/** 호출만 기록하는 로거 */
export function makeLogger(): ParleyLogger {
  const logger: ParleyLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
    flush: vi.fn(async () => {}),
  };
  return logger;
}

/** HS256 JWT 생성 */
export function signTestToken(
  payload: Record<string, unknown>,
  secret: string = TEST_SECRET,
): string {
  const header = Buffer.from(JSON.stringify({ alg: 'HS256', typ: 'JWT' })).toString('base64url');
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  const sig = createHmac('sha256', secret).update(`${header}.${body}`).digest('base64url');
  return `${header}.${body}.${sig}`;
}

/** 사용자 토큰 */
export function tokenFor(userId: string): string {
  return signTestToken({ sub: userId, exp: Math.floor(Date.now() / 1000) + 3600 });
}

/** 테스트용 서버 설정 */
export function makeServerConfig(
  overrides: {
    ws?: Partial<GatewayServerConfig['ws']>;
    sessions?: Partial<GatewayServerConfig['sessions']>;
    rateLimits?: GatewayServerConfig['rateLimits'];
  } = {},
): GatewayServerConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    cors: { origins: ['http://localhost:3000'], maxAge: 600 },
    auth: { apiKeys: [TEST_API_KEY], jwtSecret: TEST_SECRET },
    ws: {
      heartbeatIntervalMs: 30_000,
      identifyTimeoutMs: 10_000,
      maxPayloadBytes: 4096,
      maxBufferedBytes: 1024 * 1024,
      maxConnections: 100,
      ...overrides.ws,
    },
    sessions: {
      resumeTtlMs: 30_000,
      maxBufferedEvents: 100,
      maxGuildsPerShard: 2500,
      ...overrides.sessions,
    },
    rateLimits: { ...getDefaults().rateLimits, ...overrides.rateLimits },
  };
}

/**
 * 기본 픽스처
 *
 * - 사용자 1(alice, 길드 소유자), 2(bob, mod 역할), 3(carol), 4(dave, 비멤버)
 * - 길드 100: @everyone = VIEW_CHANNEL | SEND_MESSAGES (3072), mod(101)
 * - 채널 200(general), 201(secret: @everyone VIEW 거부, mod 허용), DM 300(1, 2)
 * - 1 ↔ 2 친구
 */
export const FIXTURE: DirectorySnapshot = {
  users: [
    { id: '1', username: 'alice', discriminator: '0001', avatar: null },
    { id: '2', username: 'bob', discriminator: '0002', avatar: null },
    { id: '3', username: 'carol', discriminator: '0003', avatar: null },
    { id: '4', username: 'dave', discriminator: '0004', avatar: null },
  ],
  guilds: [{ id: '100', name: 'Test Guild', ownerId: '1', icon: null }],
  roles: [
    { id: '100', guildId: '100', name: '@everyone', position: 0, permissions: '3072' },
    { id: '101', guildId: '100', name: 'mod', position: 1, permissions: '0' },
  ],
  channels: [
    { id: '200', type: 'guild_text', guildId: '100', name: 'general', position: 0 },
    {
      id: '201',
      type: 'guild_text',
      guildId: '100',
      name: 'secret',
      position: 1,
      overwrites: [
        { id: '100', type: 'role', allow: '0', deny: '1024' },
        { id: '101', type: 'role', allow: '1024', deny: '0' },
      ],
    },
    { id: '300', type: 'dm', recipientIds: ['1', '2'] },
  ],
  members: [
    { guildId: '100', userId: '1', roleIds: [], joinedAt: '2024-01-01T00:00:00.000Z' },
    { guildId: '100', userId: '2', roleIds: ['101'], joinedAt: '2024-01-02T00:00:00.000Z' },
    { guildId: '100', userId: '3', roleIds: [], joinedAt: '2024-01-03T00:00:00.000Z' },
  ],
  relationships: [
    { userId: '1', peerId: '2', type: 'friend' },
    { userId: '2', peerId: '1', type: 'friend' },
  ],
};

export function makeDirectory(): InMemoryDirectory {
  return InMemoryDirectory.fromSnapshot(FIXTURE);
}

/** 픽스처 디렉터리 위의 런타임 */
export function makeRuntime(config: GatewayServerConfig = makeServerConfig()): GatewayRuntime {
  return createGatewayRuntime(config, { directory: makeDirectory(), logger: makeLogger() });
}

/** Mock WebSocket */
export function createMockWs() {
  const emitter = new EventEmitter();
  const sent: string[] = [];
  let readyState = 1; // OPEN

  const ws = {
    get readyState() {
      return readyState;
    },
    OPEN: 1,
    CLOSED: 3,
    bufferedAmount: 0,
    closeCode: undefined as number | undefined,
    closeReason: undefined as string | undefined,
    close: vi.fn((code?: number, reason?: string) => {
      readyState = 3;
      ws.closeCode = code;
      ws.closeReason = reason;
    }),
    send: vi.fn((data: string) => {
      sent.push(data);
    }),
    on: (event: string, listener: (...args: unknown[]) => void) => {
      emitter.on(event, listener);
      return ws;
    },
    emit: (event: string, ...args: unknown[]) => emitter.emit(event, ...args),
    /** 클라이언트 → 서버 텍스트 프레임 */
    receive(frame: unknown) {
      emitter.emit('message', Buffer.from(JSON.stringify(frame)), false);
    },
    /** 클라이언트가 끊음 */
    drop(code: number) {
      readyState = 3;
      emitter.emit('close', code, Buffer.alloc(0));
    },
    get sentMessages() {
      return sent;
    },
    /** 보낸 프레임 파싱 */
    frames(): GatewayFrame[] {
      return sent.map((raw) => JSON.parse(raw) as GatewayFrame);
    },
    /** DISPATCH 프레임만 (t, s, d) */
    dispatches(): Array<{ t: string | null; s: number | null; d: unknown }> {
      return this.frames()
        .filter((frame) => frame.op === 0)
        .map((frame) => ({ t: frame.t, s: frame.s, d: frame.d }));
    },
  };

  return ws;
}

export type MockWs = ReturnType<typeof createMockWs>;

export function makeReq(remoteAddress = '127.0.0.1'): IncomingMessage {
  return { headers: {}, socket: { remoteAddress } } as unknown as IncomingMessage;
}

/** 새 연결 (HELLO까지 전송된 상태) */
export function openConnection(
  rt: GatewayRuntime,
  remoteAddress = '127.0.0.1',
): { ws: MockWs; conn: GatewayConnection } {
  const ws = createMockWs();
  const conn = new GatewayConnection(ws as unknown as WebSocket, remoteAddress, rt);
  conn.start();
  return { ws, conn };
}

/** IDENTIFY까지 마친 연결 */
export function identify(
  rt: GatewayRuntime,
  userId: string,
  extra: Record<string, unknown> = {},
): { ws: MockWs; conn: GatewayConnection; sessionId: string } {
  const { ws, conn } = openConnection(rt);
  ws.receive({ op: 2, d: { token: tokenFor(userId), ...extra } });
  const sessionId = conn.sessionId;
  if (sessionId === undefined) {
    throw new Error(`identify failed for ${userId}: closed with ${String(ws.closeCode)}`);
  }
  return { ws, conn, sessionId };
}

/** 보낸 프레임을 기록하는 FrameTransport */
export interface FrameRecorder extends FrameTransport {
  readonly frames: string[];
  /** DISPATCH 이벤트 이름 목록 */
  events(): string[];
  /** 특정 이벤트의 d 목록 */
  payloads(eventType: string): unknown[];
}

export function frameRecorder(id: string): FrameRecorder {
  const frames: string[] = [];
  const parsed = () => frames.map((raw) => JSON.parse(raw) as GatewayFrame);
  return {
    id,
    frames,
    sendFrame(frame) {
      frames.push(frame);
      return 'sent';
    },
    events: () => parsed().flatMap((frame) => (frame.t === null ? [] : [frame.t])),
    payloads: (eventType) => parsed().filter((frame) => frame.t === eventType).map((frame) => frame.d),
  };
}

/**
 * WebSocket 없이 IDENTIFY를 마친 것과 같은 세션 (등록 + 암묵적 구독 + 연결)
 */
export function connectSession(
  rt: GatewayRuntime,
  sessionId: string,
  userId: string,
  guildIds: readonly string[] = rt.directory.getUserGuildIds(userId),
): { session: GatewaySession; transport: FrameRecorder } {
  const session = new GatewaySession({
    id: sessionId,
    userId,
    shard: { id: 0, count: 1 },
    maxBufferedEvents: rt.config.sessions.maxBufferedEvents,
  });
  rt.registry.register(session);
  rt.membership.subscribeSession(session, guildIds);
  const transport = frameRecorder(`conn-${sessionId}`);
  session.attach(transport);
  return { session, transport };
}
