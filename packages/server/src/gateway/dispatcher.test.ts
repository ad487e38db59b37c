// packages/server/src/gateway/dispatcher.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getEventBus, resetEventBus, type ParleyLogger } from '@parley/infra';
import { EventDispatcher } from './dispatcher.js';
import { SessionRegistry } from './registry.js';
import { GatewaySession, type FrameTransport } from './session.js';
import { makeDirectory, makeLogger } from '../../test/helpers.js';

interface Recorder extends FrameTransport {
  readonly frames: string[];
}

function recorder(id: string, outcome: 'sent' | 'saturated' = 'sent'): Recorder {
  const frames: string[] = [];
  return {
    id,
    frames,
    sendFrame(frame) {
      frames.push(frame);
      return outcome;
    },
  };
}

describe('EventDispatcher', () => {
  let registry: SessionRegistry;
  let dispatcher: EventDispatcher;
  let logger: ParleyLogger;

  function connect(sessionId: string, userId: string, transport = recorder(`c-${sessionId}`)) {
    const session = new GatewaySession({
      id: sessionId,
      userId,
      shard: { id: 0, count: 1 },
      maxBufferedEvents: 10,
    });
    registry.register(session);
    session.attach(transport);
    return { session, transport };
  }

  beforeEach(() => {
    logger = makeLogger();
    registry = new SessionRegistry({ resumeTtlMs: 60_000 });
    dispatcher = new EventDispatcher({ registry, directory: makeDirectory(), logger });
  });

  afterEach(() => {
    registry.dispose();
    resetEventBus();
  });

  describe('guild', () => {
    it('delivers to every subscriber of the guild topic', () => {
      const a = connect('s1', '1');
      const b = connect('s2', '2');
      connect('s4', '4');
      registry.subscribe('s1', { kind: 'guild', key: '100' });
      registry.subscribe('s2', { kind: 'guild', key: '100' });

      const result = dispatcher.dispatch('guild', '100', 'GUILD_UPDATE', { id: '100' });

      expect(result).toEqual({ delivered: ['s1', 's2'], buffered: [], skipped: [] });
      expect(a.transport.frames).toEqual(['{"op":0,"d":{"id":"100"},"s":1,"t":"GUILD_UPDATE"}']);
      expect(b.transport.frames).toHaveLength(1);
    });

    it('filters by VIEW_CHANNEL when a channel id is given', () => {
      connect('s2', '2');
      connect('s3', '3');
      registry.subscribe('s2', { kind: 'guild', key: '100' });
      registry.subscribe('s3', { kind: 'guild', key: '100' });

      const result = dispatcher.dispatch('guild', '100', 'TYPING_START', {}, { channelId: '201' });

      expect(result.delivered).toEqual(['s2']);
    });

    it('stops delivering once a session unsubscribes', () => {
      const a = connect('s1', '1');
      registry.subscribe('s1', { kind: 'guild', key: '100' });
      dispatcher.dispatch('guild', '100', 'A', null);

      registry.unsubscribe('s1', { kind: 'guild', key: '100' });
      const result = dispatcher.dispatch('guild', '100', 'B', null);

      expect(result.delivered).toEqual([]);
      expect(a.transport.frames).toHaveLength(1);
    });
  });

  describe('channel', () => {
    it('routes guild channels through guild subscribers with VIEW_CHANNEL', () => {
      connect('s1', '1');
      connect('s3', '3');
      registry.subscribe('s1', { kind: 'guild', key: '100' });
      registry.subscribe('s3', { kind: 'guild', key: '100' });

      expect(dispatcher.dispatch('channel', '200', 'MESSAGE_CREATE', {}).delivered).toEqual(['s1', 's3']);
      expect(dispatcher.dispatch('channel', '201', 'MESSAGE_CREATE', {}).delivered).toEqual(['s1']);
    });

    it('routes private channels through the channel topic', () => {
      connect('s1', '1');
      connect('s3', '3');
      registry.subscribe('s1', { kind: 'channel', key: '300' });

      expect(dispatcher.dispatch('channel', '300', 'MESSAGE_CREATE', {}).delivered).toEqual(['s1']);
    });

    it('warns and delivers nothing for unknown channels', () => {
      connect('s1', '1');
      const result = dispatcher.dispatch('channel', '999', 'MESSAGE_CREATE', {});

      expect(result).toEqual({ delivered: [], buffered: [], skipped: [] });
      expect(logger.warn).toHaveBeenCalledWith('Dispatch to unknown channel 999');
    });
  });

  describe('user / friend / lazy-member-list', () => {
    it('user delivers to every session of the user', () => {
      connect('s1', '1');
      connect('s1b', '1');
      connect('s2', '2');

      expect(dispatcher.dispatch('user', '1', 'USER_UPDATE', {}).delivered).toEqual(['s1', 's1b']);
    });

    it('friend delivers to subscribers of the friend topic', () => {
      connect('s2', '2');
      registry.subscribe('s2', { kind: 'friend', key: '1' });

      expect(dispatcher.dispatch('friend', '1', 'PRESENCE_UPDATE', {}).delivered).toEqual(['s2']);
    });

    it('lazy-member-list delivers to list subscribers', () => {
      connect('s1', '1');
      registry.subscribe('s1', { kind: 'lazy-member-list', key: '100' });

      expect(
        dispatcher.dispatch('lazy-member-list', '100', 'GUILD_MEMBER_LIST_UPDATE', {}).delivered,
      ).toEqual(['s1']);
    });
  });

  describe('delivery outcomes', () => {
    it('buffers for detached sessions', () => {
      const { session } = connect('s1', '1');
      session.detachTransport();

      const result = dispatcher.dispatch('user', '1', 'USER_UPDATE', {});

      expect(result).toEqual({ delivered: [], buffered: ['s1'], skipped: [] });
      expect(session.seq).toBe(1);
    });

    it('skips saturated sessions and keeps going', () => {
      connect('s1', '1', recorder('c1', 'saturated'));
      connect('s1b', '1');

      const result = dispatcher.dispatch('user', '1', 'USER_UPDATE', {});

      expect(result).toEqual({ delivered: ['s1b'], buffered: [], skipped: ['s1'] });
    });

    it('isolates a throwing transport', () => {
      const broken: FrameTransport = {
        id: 'broken',
        sendFrame: () => {
          throw new Error('socket gone');
        },
      };
      connect('s1', '1', { ...broken, frames: [] });
      connect('s1b', '1');

      const result = dispatcher.dispatch('user', '1', 'USER_UPDATE', {});

      expect(result).toEqual({ delivered: ['s1b'], buffered: [], skipped: ['s1'] });
      expect(logger.error).toHaveBeenCalledWith('Delivery to session s1 failed: Error: socket gone');
    });

    it('applies the extra filter', () => {
      connect('s1', '1');
      connect('s1b', '1');

      const result = dispatcher.dispatch('user', '1', 'USER_UPDATE', {}, {
        filter: (session) => session.id !== 's1',
      });

      expect(result.delivered).toEqual(['s1b']);
    });

    it('keeps per-session event order across dispatches', () => {
      const { transport } = connect('s1', '1');
      registry.subscribe('s1', { kind: 'guild', key: '100' });

      dispatcher.dispatch('guild', '100', 'FIRST', 1);
      dispatcher.dispatch('user', '1', 'SECOND', 2);
      dispatcher.dispatch('guild', '100', 'THIRD', 3);

      expect(transport.frames).toEqual([
        '{"op":0,"d":1,"s":1,"t":"FIRST"}',
        '{"op":0,"d":2,"s":2,"t":"SECOND"}',
        '{"op":0,"d":3,"s":3,"t":"THIRD"}',
      ]);
    });

    it('reports the fan-out on the event bus', () => {
      const handler = vi.fn();
      getEventBus().on('gateway:dispatch', handler);
      connect('s1', '1');

      dispatcher.dispatch('user', '1', 'USER_UPDATE', {});

      expect(handler).toHaveBeenCalledWith('user', '1', 'USER_UPDATE', 1, 0);
    });
  });

  describe('dispatchMany', () => {
    it('delivers once per session with unique', () => {
      connect('s1', '1');
      registry.subscribe('s1', { kind: 'guild', key: '100' });
      registry.subscribe('s1', { kind: 'guild', key: '101' });

      const result = dispatcher.dispatchMany('guild', ['100', '101'], 'PRESENCE_UPDATE', (key) => ({
        guild_id: key,
      }), { unique: true });

      expect(result.delivered).toEqual(['s1']);
      expect(registry.get('s1')?.seq).toBe(1);
    });

    it('delivers per key without unique and builds the payload per key', () => {
      const { transport } = connect('s1', '1');
      registry.subscribe('s1', { kind: 'guild', key: '100' });
      registry.subscribe('s1', { kind: 'guild', key: '101' });
      const payloadFn = vi.fn((key: string) => ({ guild_id: key }));

      const result = dispatcher.dispatchMany('guild', ['100', '101', '102'], 'X', payloadFn);

      expect(result.delivered).toEqual(['s1', 's1']);
      expect(payloadFn).toHaveBeenCalledTimes(2);
      expect(transport.frames[1]).toBe('{"op":0,"d":{"guild_id":"101"},"s":2,"t":"X"}');
    });
  });
});
