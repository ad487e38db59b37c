// packages/server/src/gateway/session.ts
import { randomBytes } from 'node:crypto';
import {
  createSessionId,
  type PresenceRecord,
  type SessionId,
  type ShardInfo,
  type Snowflake,
} from '@parley/types';
import { encodeDispatch } from './protocol/codec.js';
import { ReplayBuffer, type ReplayedEvent } from './replay-buffer.js';

/** 세션에 연결된 물리 연결의 송신 창구 */
export interface FrameTransport {
  readonly id: string;
  /** 'saturated'이면 프레임은 전송되지 않았고, 연결은 스스로 닫힌다 */
  sendFrame(frame: string): 'sent' | 'saturated';
}

/**
 * 전달 결과
 * - sent: 연결로 전송
 * - buffered: 분리 상태라 재생 버퍼에만 보관
 * - saturated: 연결 송신 버퍼 포화 (재생 버퍼에는 보관됨)
 */
export type DeliveryOutcome = 'sent' | 'buffered' | 'saturated';

export interface GatewaySessionInit {
  readonly userId: Snowflake;
  readonly shard: ShardInfo;
  readonly maxBufferedEvents: number;
  readonly presence?: PresenceRecord;
  readonly largeThreshold?: number;
  /** 테스트용 고정 ID */
  readonly id?: string;
}

export const DEFAULT_PRESENCE: Readonly<PresenceRecord> = Object.freeze({
  status: 'online',
  since: null,
  afk: false,
  activities: [],
});

/** 40자 16진수 세션 ID */
export function generateSessionId(): SessionId {
  return createSessionId(randomBytes(20).toString('hex'));
}

/**
 * 게이트웨이 세션 -- 한 사용자의 논리적 연결.
 *
 * 물리 연결이 끊겨도 resume TTL 동안 살아남아 이벤트를 계속 버퍼링한다.
 * seq는 세션 단위로 단조 증가하며 재연결해도 이어진다.
 */
export class GatewaySession {
  readonly id: SessionId;
  readonly userId: Snowflake;
  readonly shard: ShardInfo;
  readonly createdAt = Date.now();
  readonly largeThreshold: number;
  presence: PresenceRecord;
  /** 클라이언트 HEARTBEAT가 보고한 마지막 seq */
  lastAckSeq: number | null = null;

  private seqCounter = 0;
  private readonly replay: ReplayBuffer;
  private transport: FrameTransport | null = null;

  constructor(init: GatewaySessionInit) {
    this.id = init.id !== undefined ? createSessionId(init.id) : generateSessionId();
    this.userId = init.userId;
    this.shard = init.shard;
    this.presence = init.presence ?? { ...DEFAULT_PRESENCE, activities: [] };
    this.largeThreshold = init.largeThreshold ?? 50;
    this.replay = new ReplayBuffer(init.maxBufferedEvents);
  }

  /** 마지막으로 발급한 seq */
  get seq(): number {
    return this.seqCounter;
  }

  get attached(): boolean {
    return this.transport !== null;
  }

  get transportId(): string | undefined {
    return this.transport?.id;
  }

  get bufferedEvents(): number {
    return this.replay.size;
  }

  attach(transport: FrameTransport): void {
    this.transport = transport;
  }

  /** 연결 분리. 해당 연결이 아닌 경우 무시 */
  detachTransport(transportId?: string): void {
    if (transportId === undefined || this.transport?.id === transportId) {
      this.transport = null;
    }
  }

  /** seq를 발급해 프레임을 만들고 재생 버퍼에 넣은 뒤 연결되어 있으면 전송 */
  deliver(eventType: string, dataJson: string): DeliveryOutcome {
    const seq = ++this.seqCounter;
    const frame = encodeDispatch(eventType, dataJson, seq);
    this.replay.push({ seq, eventType, data: dataJson, frame });
    if (!this.transport) {
      return 'buffered';
    }
    return this.transport.sendFrame(frame);
  }

  /**
   * seq를 소비하지 않는 DISPATCH (READY, RESUMED, RATE_LIMITED 등).
   * 버퍼링하지 않으며 분리 상태면 버린다.
   */
  sendUnsequenced(
    eventType: string,
    dataJson: string,
    seq = this.seqCounter,
  ): 'sent' | 'saturated' | 'detached' {
    if (!this.transport) {
      return 'detached';
    }
    return this.transport.sendFrame(encodeDispatch(eventType, dataJson, seq));
  }

  /** seq 이후 이벤트. 버퍼가 이미 일부를 버렸으면 null */
  replayAfter(seq: number): ReplayedEvent[] | null {
    return this.replay.after(seq, this.seqCounter);
  }

  /** 재생 버퍼 비우기 (세션 폐기 시) */
  clearReplay(): void {
    this.replay.clear();
  }
}
