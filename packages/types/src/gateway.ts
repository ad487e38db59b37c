import type { Snowflake } from './common.js';
import type { PresenceRecord } from './storage.js';

/** 게이트웨이 opcode */
export const GATEWAY_OPCODES = {
  DISPATCH: 0,
  HEARTBEAT: 1,
  IDENTIFY: 2,
  PRESENCE_UPDATE: 3,
  RESUME: 6,
  RECONNECT: 7,
  REQUEST_GUILD_MEMBERS: 8,
  INVALID_SESSION: 9,
  HELLO: 10,
  HEARTBEAT_ACK: 11,
  LAZY_REQUEST: 14,
} as const;

export type GatewayOpcode = (typeof GATEWAY_OPCODES)[keyof typeof GATEWAY_OPCODES];

/** 게이트웨이 close code */
export const GATEWAY_CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  UNKNOWN_ERROR: 4000,
  UNKNOWN_OPCODE: 4001,
  DECODE_ERROR: 4002,
  NOT_AUTHENTICATED: 4003,
  AUTHENTICATION_FAILED: 4004,
  ALREADY_AUTHENTICATED: 4005,
  INVALID_SEQ: 4007,
  RATE_LIMITED: 4008,
  SESSION_TIMED_OUT: 4009,
  INVALID_SHARD: 4010,
  SHARDING_REQUIRED: 4011,
  AUTHENTICATION_TIMEOUT: 4012,
} as const;

export type GatewayCloseCode = (typeof GATEWAY_CLOSE_CODES)[keyof typeof GATEWAY_CLOSE_CODES];

/** 와이어 프레임 `{ op, d, s, t }` */
export interface GatewayFrame<D = unknown> {
  op: GatewayOpcode;
  d: D;
  s: number | null;
  t: string | null;
}

// ─── 클라이언트 → 서버 페이로드 ───

export interface IdentifyPayload {
  token: string;
  properties?: Record<string, string>;
  shard?: [number, number];
  presence?: PresenceUpdatePayload;
  large_threshold?: number;
}

export interface ResumePayload {
  token: string;
  session_id: string;
  seq: number;
}

export type PresenceUpdatePayload = PresenceRecord;

export interface RequestGuildMembersPayload {
  guild_id: Snowflake;
  query?: string;
  limit?: number;
  user_ids?: Snowflake[];
}

export interface LazyRequestPayload {
  guild_id: Snowflake;
  /** [start, end] 인덱스 쌍 */
  ranges: Array<[number, number]>;
}

// ─── 서버 → 클라이언트 페이로드 ───

export interface HelloPayload {
  heartbeat_interval: number;
  nonce: string;
}

export interface RateLimitedPayload {
  opcode: GatewayOpcode;
  retry_after_ms: number;
  meta?: Record<string, unknown>;
}

// ─── 토픽 ───

/** 디스패처가 구분하는 토픽 종류 (닫힌 유니온) */
export type TopicKind = 'guild' | 'channel' | 'user' | 'friend' | 'lazy-member-list';

export interface Topic {
  kind: TopicKind;
  key: string;
}

/** 샤드 정보 */
export interface ShardInfo {
  id: number;
  count: number;
}

/**
 * 디스패치 결과 -- 세션 ID 목록
 *
 * - delivered: 연결된 세션에 전송됨
 * - buffered: 분리된 세션의 재생 버퍼에 보관됨
 * - skipped: 포화/오류로 건너뜀
 */
export interface DispatchResult {
  delivered: string[];
  buffered: string[];
  skipped: string[];
}

/** 게이트웨이 상태 */
export interface GatewayStatus {
  uptime: number;
  connections: number;
  sessions: number;
  detachedSessions: number;
  version: string;
}
