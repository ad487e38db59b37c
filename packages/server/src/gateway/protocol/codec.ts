// packages/server/src/gateway/protocol/codec.ts
import type { RawData } from 'ws';
import type { z } from 'zod/v4';
import {
  GATEWAY_CLOSE_CODES,
  GATEWAY_OPCODES,
  type GatewayOpcode,
  type IdentifyPayload,
  type LazyRequestPayload,
  type PresenceUpdatePayload,
  type RequestGuildMembersPayload,
  type ResumePayload,
} from '@parley/types';
import { GatewayCloseError } from '../errors.js';
import {
  FrameEnvelopeSchema,
  HeartbeatSchema,
  IdentifySchema,
  LazyRequestSchema,
  PresenceSchema,
  RequestGuildMembersSchema,
  ResumeSchema,
} from './schemas.js';

/** 디코딩된 인바운드 프레임 (opcode 판별 유니온) */
export type InboundFrame =
  | { readonly op: typeof GATEWAY_OPCODES.HEARTBEAT; readonly d: number | null }
  | { readonly op: typeof GATEWAY_OPCODES.IDENTIFY; readonly d: IdentifyPayload }
  | { readonly op: typeof GATEWAY_OPCODES.PRESENCE_UPDATE; readonly d: PresenceUpdatePayload }
  | { readonly op: typeof GATEWAY_OPCODES.RESUME; readonly d: ResumePayload }
  | {
      readonly op: typeof GATEWAY_OPCODES.REQUEST_GUILD_MEMBERS;
      readonly d: RequestGuildMembersPayload;
    }
  | { readonly op: typeof GATEWAY_OPCODES.LAZY_REQUEST; readonly d: LazyRequestPayload };

/** WebSocket close reason 최대 바이트 수 */
const MAX_CLOSE_REASON_BYTES = 123;

function rawToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

function parsePayload<T>(schema: z.ZodType<T>, value: unknown, op: number): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at d.${issue.path.join('.')}` : '';
    throw new GatewayCloseError(
      GATEWAY_CLOSE_CODES.DECODE_ERROR,
      `Invalid payload for op ${op}${where}`,
      { details: { op } },
    );
  }
  return result.data;
}

/**
 * 인바운드 프레임 디코딩
 *
 * - 바이너리/초과 크기/비 JSON/스키마 불일치 → DECODE_ERROR (4002)
 * - 클라이언트가 보낼 수 없는 opcode → UNKNOWN_OPCODE (4001)
 */
export function decodeFrame(data: RawData, isBinary: boolean, maxPayloadBytes: number): InboundFrame {
  if (isBinary) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.DECODE_ERROR, 'Binary frames are not supported');
  }

  const buffer = rawToBuffer(data);
  if (buffer.byteLength > maxPayloadBytes) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.DECODE_ERROR, 'Payload too large', {
      details: { size: buffer.byteLength, maxPayloadBytes },
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(buffer.toString('utf8'));
  } catch (err) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.DECODE_ERROR, 'Invalid JSON', {
      cause: err instanceof Error ? err : undefined,
    });
  }

  const envelope = FrameEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.DECODE_ERROR, 'Invalid frame envelope');
  }

  const { op, d } = envelope.data;
  switch (op) {
    case GATEWAY_OPCODES.HEARTBEAT:
      return { op: GATEWAY_OPCODES.HEARTBEAT, d: parsePayload(HeartbeatSchema, d ?? null, op) };
    case GATEWAY_OPCODES.IDENTIFY:
      return { op: GATEWAY_OPCODES.IDENTIFY, d: parsePayload(IdentifySchema, d, op) };
    case GATEWAY_OPCODES.PRESENCE_UPDATE:
      return { op: GATEWAY_OPCODES.PRESENCE_UPDATE, d: parsePayload(PresenceSchema, d, op) };
    case GATEWAY_OPCODES.RESUME:
      return { op: GATEWAY_OPCODES.RESUME, d: parsePayload(ResumeSchema, d, op) };
    case GATEWAY_OPCODES.REQUEST_GUILD_MEMBERS:
      return { op: GATEWAY_OPCODES.REQUEST_GUILD_MEMBERS, d: parsePayload(RequestGuildMembersSchema, d, op) };
    case GATEWAY_OPCODES.LAZY_REQUEST:
      return { op: GATEWAY_OPCODES.LAZY_REQUEST, d: parsePayload(LazyRequestSchema, d, op) };
    default:
      throw new GatewayCloseError(GATEWAY_CLOSE_CODES.UNKNOWN_OPCODE, `Unknown opcode: ${op}`, {
        details: { op },
      });
  }
}

/** 페이로드 직렬화 (undefined → null) */
export function serializePayload(payload: unknown): string {
  return payload === undefined ? 'null' : JSON.stringify(payload);
}

/** 비 DISPATCH 프레임 인코딩 */
export function encodeFrame(op: GatewayOpcode, d: unknown, s: number | null = null): string {
  return `{"op":${op},"d":${serializePayload(d)},"s":${s === null ? 'null' : s},"t":null}`;
}

/**
 * DISPATCH 프레임 인코딩.
 * dataJson은 이미 직렬화된 페이로드 -- 수신자마다 seq만 다르게 찍는다.
 */
export function encodeDispatch(eventType: string, dataJson: string, seq: number): string {
  return `{"op":${GATEWAY_OPCODES.DISPATCH},"d":${dataJson},"s":${seq},"t":${JSON.stringify(eventType)}}`;
}

/** close reason을 123바이트 이하로 자른다 */
export function truncateCloseReason(reason: string): string {
  if (Buffer.byteLength(reason) <= MAX_CLOSE_REASON_BYTES) {
    return reason;
  }
  let out = reason;
  while (Buffer.byteLength(out) > MAX_CLOSE_REASON_BYTES - 3) {
    out = out.slice(0, -1);
  }
  return `${out}...`;
}
