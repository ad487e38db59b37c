// packages/server/src/gateway/presence.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { PresenceRecord } from '@parley/types';
import { resetEventBus } from '@parley/infra';
import { disposeGatewayRuntime, type GatewayRuntime } from './context.js';
import { connectSession, frameRecorder, makeRuntime } from '../../test/helpers.js';

const IDLE: PresenceRecord = {
  status: 'idle',
  since: 1_700_000_000_000,
  afk: true,
  activities: [{ name: 'chess', type: 0 }],
};

describe('PresenceService', () => {
  let rt: GatewayRuntime;

  beforeEach(() => {
    rt = makeRuntime();
  });

  afterEach(() => {
    disposeGatewayRuntime(rt);
    resetEventBus();
  });

  it('fans out to guild peers and friends but not the sender', () => {
    const alice = connectSession(rt, 's1', '1');
    const bob = connectSession(rt, 's2', '2');
    const carol = connectSession(rt, 's3', '3');

    const result = rt.presence.update(alice.session, IDLE);

    expect(result).toEqual({ delivered: ['s2', 's3', 's2'], buffered: [], skipped: [] });
    expect(alice.transport.frames).toEqual([]);
    expect(carol.transport.payloads('PRESENCE_UPDATE')).toEqual([
      {
        user: { id: '1' },
        status: 'idle',
        activities: [{ name: 'chess', type: 0 }],
        since: 1_700_000_000_000,
        guild_id: '100',
      },
    ]);
    // 친구는 길드 없는 사본도 받는다
    expect(bob.transport.payloads('PRESENCE_UPDATE')).toEqual([
      expect.objectContaining({ guild_id: '100' }),
      {
        user: { id: '1' },
        status: 'idle',
        activities: [{ name: 'chess', type: 0 }],
        since: 1_700_000_000_000,
      },
    ]);
  });

  it('stores the presence on the session', () => {
    const alice = connectSession(rt, 's1', '1');
    rt.presence.update(alice.session, IDLE);
    expect(alice.session.presence).toBe(IDLE);
    expect(rt.presence.current('1')).toBe(IDLE);
  });

  it('shows invisible users as offline', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');

    rt.presence.update(alice.session, { ...IDLE, status: 'invisible' });

    expect(carol.transport.payloads('PRESENCE_UPDATE')).toEqual([
      { user: { id: '1' }, status: 'offline', activities: [], since: 1_700_000_000_000, guild_id: '100' },
    ]);
    expect(rt.presence.current('1')).toBeUndefined();
  });

  it('publishes offline when the last session of a user goes away', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');
    rt.presence.update(alice.session, IDLE);

    rt.registry.unregister('s1', 'closed');

    const updates = carol.transport.payloads('PRESENCE_UPDATE');
    expect(updates).toHaveLength(2);
    expect(updates[1]).toMatchObject({ user: { id: '1' }, status: 'offline' });
    expect(rt.presence.current('1')).toBeUndefined();
  });

  it('announce publishes the session presence, online by default', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');

    rt.presence.announce(alice.session);

    expect(carol.transport.payloads('PRESENCE_UPDATE')).toEqual([
      { user: { id: '1' }, status: 'online', activities: [], since: null, guild_id: '100' },
    ]);
    expect(rt.presence.current('1')?.status).toBe('online');
  });

  it('publishes offline once the last attached session detaches', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');
    rt.presence.update(alice.session, IDLE);

    rt.registry.detach('s1', 'client close 1006');

    const updates = carol.transport.payloads('PRESENCE_UPDATE');
    expect(updates).toHaveLength(2);
    expect(updates[1]).toMatchObject({ user: { id: '1' }, status: 'offline' });
    expect(rt.presence.current('1')).toBeUndefined();
  });

  it('restore republishes after a detach and is a no-op while still online', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');
    rt.presence.update(alice.session, IDLE);
    expect(rt.presence.restore(alice.session)).toBeUndefined();

    rt.registry.detach('s1', 'client close 1006');
    rt.registry.reattach('s1', frameRecorder('conn-s1-resumed'));
    const result = rt.presence.restore(alice.session);

    expect(result?.delivered).toEqual(['s3']);
    expect(carol.transport.payloads('PRESENCE_UPDATE').map((d) => (d as { status: string }).status)).toEqual([
      'idle',
      'offline',
      'idle',
    ]);
    expect(rt.presence.current('1')).toBe(IDLE);
  });

  it('stays quiet while another session of the user remains', () => {
    const alice = connectSession(rt, 's1', '1');
    connectSession(rt, 's1b', '1');
    const carol = connectSession(rt, 's3', '3');
    rt.presence.update(alice.session, IDLE);

    rt.registry.unregister('s1', 'closed');

    expect(carol.transport.payloads('PRESENCE_UPDATE')).toHaveLength(1);
  });

  it('does not publish offline for users that never published a presence', () => {
    connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');

    rt.registry.unregister('s1', 'expired');

    expect(carol.transport.frames).toEqual([]);
  });

  it('does not publish offline during shutdown', () => {
    const alice = connectSession(rt, 's1', '1');
    const carol = connectSession(rt, 's3', '3');
    rt.presence.update(alice.session, IDLE);

    rt.registry.unregister('s1', 'shutdown');

    expect(carol.transport.payloads('PRESENCE_UPDATE')).toHaveLength(1);
  });

  it('resyncs member list subscribers of the user guilds', () => {
    const alice = connectSession(rt, 's1', '1');
    const bob = connectSession(rt, 's2', '2');
    rt.memberList.subscribe(bob.session, { guild_id: '100', ranges: [[0, 99]] });

    rt.presence.update(alice.session, IDLE);

    expect(bob.transport.events()).toEqual([
      'GUILD_MEMBER_LIST_UPDATE',
      'PRESENCE_UPDATE',
      'PRESENCE_UPDATE',
      'GUILD_MEMBER_LIST_UPDATE',
    ]);
  });
});
