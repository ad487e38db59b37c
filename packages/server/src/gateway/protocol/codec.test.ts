// packages/server/src/gateway/protocol/codec.test.ts
import { describe, it, expect } from 'vitest';
import { GatewayCloseError } from '../errors.js';
import { decodeFrame, encodeDispatch, encodeFrame, truncateCloseReason } from './codec.js';

const MAX = 4096;

function text(frame: unknown): Buffer {
  return Buffer.from(JSON.stringify(frame));
}

function closeCodeOf(fn: () => unknown): number | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GatewayCloseError) {
      return err.closeCode;
    }
    throw err;
  }
  return undefined;
}

describe('decodeFrame', () => {
  it('decodes heartbeats with a seq or null', () => {
    expect(decodeFrame(text({ op: 1, d: 5 }), false, MAX)).toEqual({ op: 1, d: 5 });
    expect(decodeFrame(text({ op: 1, d: null }), false, MAX)).toEqual({ op: 1, d: null });
    expect(decodeFrame(text({ op: 1 }), false, MAX)).toEqual({ op: 1, d: null });
  });

  it('decodes identify with optional fields', () => {
    const frame = decodeFrame(
      text({ op: 2, d: { token: 'abc', shard: [0, 2], large_threshold: 100 } }),
      false,
      MAX,
    );
    expect(frame).toEqual({ op: 2, d: { token: 'abc', shard: [0, 2], large_threshold: 100 } });
  });

  it('decodes resume', () => {
    const frame = decodeFrame(text({ op: 6, d: { token: 't', session_id: 'abc', seq: 3 } }), false, MAX);
    expect(frame).toEqual({ op: 6, d: { token: 't', session_id: 'abc', seq: 3 } });
  });

  it('decodes lazy requests and rejects reversed ranges', () => {
    expect(
      decodeFrame(text({ op: 14, d: { guild_id: '100', ranges: [[0, 99]] } }), false, MAX),
    ).toEqual({ op: 14, d: { guild_id: '100', ranges: [[0, 99]] } });
    expect(
      closeCodeOf(() =>
        decodeFrame(text({ op: 14, d: { guild_id: '100', ranges: [[10, 0]] } }), false, MAX),
      ),
    ).toBe(4002);
  });

  it('rejects binary frames with 4002', () => {
    expect(closeCodeOf(() => decodeFrame(text({ op: 1, d: null }), true, MAX))).toBe(4002);
  });

  it('rejects oversized payloads with 4002', () => {
    expect(closeCodeOf(() => decodeFrame(text({ op: 1, d: null }), false, 5))).toBe(4002);
  });

  it('rejects invalid JSON with 4002', () => {
    expect(closeCodeOf(() => decodeFrame(Buffer.from('{nope'), false, MAX))).toBe(4002);
  });

  it('rejects a malformed envelope with 4002', () => {
    expect(closeCodeOf(() => decodeFrame(text({ op: 'one' }), false, MAX))).toBe(4002);
    expect(closeCodeOf(() => decodeFrame(text([1, 2]), false, MAX))).toBe(4002);
  });

  it('rejects an invalid payload with 4002 and names the field', () => {
    try {
      decodeFrame(text({ op: 2, d: { token: '' } }), false, MAX);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GatewayCloseError);
      expect(err).toMatchObject({ closeCode: 4002, message: 'Invalid payload for op 2 at d.token' });
    }
  });

  it('rejects unknown extra presence fields', () => {
    const presence = { status: 'online', since: null, afk: false, activities: [], extra: 1 };
    expect(closeCodeOf(() => decodeFrame(text({ op: 3, d: presence }), false, MAX))).toBe(4002);
  });

  it('rejects server-only and unknown opcodes with 4001', () => {
    expect(closeCodeOf(() => decodeFrame(text({ op: 10, d: null }), false, MAX))).toBe(4001);
    expect(closeCodeOf(() => decodeFrame(text({ op: 99, d: null }), false, MAX))).toBe(4001);
  });

  it('accepts fragmented buffers', () => {
    const raw = JSON.stringify({ op: 1, d: 7 });
    const parts = [Buffer.from(raw.slice(0, 4)), Buffer.from(raw.slice(4))];
    expect(decodeFrame(parts, false, MAX)).toEqual({ op: 1, d: 7 });
  });
});

describe('encode', () => {
  it('encodes control frames with null seq and type', () => {
    expect(encodeFrame(10, { heartbeat_interval: 1000, nonce: 'n' })).toBe(
      '{"op":10,"d":{"heartbeat_interval":1000,"nonce":"n"},"s":null,"t":null}',
    );
    expect(encodeFrame(11, undefined)).toBe('{"op":11,"d":null,"s":null,"t":null}');
  });

  it('encodes dispatch frames around a pre-serialized payload', () => {
    expect(encodeDispatch('MESSAGE_CREATE', '{"content":"hi"}', 4)).toBe(
      '{"op":0,"d":{"content":"hi"},"s":4,"t":"MESSAGE_CREATE"}',
    );
  });

  it('produces JSON that round-trips to the same frame', () => {
    expect(JSON.parse(encodeDispatch('X', '[1,2]', 1))).toEqual({ op: 0, d: [1, 2], s: 1, t: 'X' });
  });
});

describe('truncateCloseReason', () => {
  it('keeps short reasons', () => {
    expect(truncateCloseReason('Session timed out')).toBe('Session timed out');
  });

  it('truncates to 123 bytes with an ellipsis', () => {
    const reason = truncateCloseReason('x'.repeat(200));
    expect(Buffer.byteLength(reason)).toBe(123);
    expect(reason.endsWith('...')).toBe(true);
  });
});
