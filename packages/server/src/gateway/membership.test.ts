// packages/server/src/gateway/membership.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resetEventBus } from '@parley/infra';
import { disposeGatewayRuntime, type GatewayRuntime } from './context.js';
import { GatewaySession } from './session.js';
import { connectSession, frameRecorder, makeRuntime } from '../../test/helpers.js';

const JOINED_AT = '2024-02-01T00:00:00.000Z';

describe('MembershipCoordinator', () => {
  let rt: GatewayRuntime;

  beforeEach(() => {
    rt = makeRuntime();
  });

  afterEach(() => {
    disposeGatewayRuntime(rt);
    resetEventBus();
  });

  describe('subscribeSession', () => {
    it('subscribes guilds, private channels and friends', () => {
      connectSession(rt, 's1', '1');

      expect(rt.registry.subscriptionsOf('s1')).toEqual([
        { kind: 'guild', key: '100' },
        { kind: 'channel', key: '300' },
        { kind: 'friend', key: '2' },
      ]);
    });
  });

  describe('addMember', () => {
    it('subscribes the new member and announces the join', () => {
      const alice = connectSession(rt, 's1', '1');
      const dave = connectSession(rt, 's4', '4');

      rt.membership.addMember({ guildId: '100', userId: '4', roleIds: [], joinedAt: JOINED_AT });

      expect(rt.registry.isSubscribed('s4', { kind: 'guild', key: '100' })).toBe(true);
      expect(dave.transport.events()).toEqual(['GUILD_CREATE', 'GUILD_MEMBER_ADD']);
      expect(dave.transport.payloads('GUILD_CREATE')).toEqual([
        expect.objectContaining({ id: '100', member_count: 4 }),
      ]);
      expect(alice.transport.payloads('GUILD_MEMBER_ADD')).toEqual([
        {
          guild_id: '100',
          user: { id: '4', username: 'dave', discriminator: '0004', avatar: null, bot: false },
          nick: null,
          roles: [],
          joined_at: JOINED_AT,
        },
      ]);
    });

    it('skips sessions whose shard does not own the guild', () => {
      const session = new GatewaySession({
        id: 's4',
        userId: '4',
        shard: { id: 1, count: 2 },
        maxBufferedEvents: 10,
      });
      rt.registry.register(session);
      const transport = frameRecorder('conn-s4');
      session.attach(transport);

      rt.membership.addMember({ guildId: '100', userId: '4', roleIds: [], joinedAt: JOINED_AT });

      expect(rt.registry.isSubscribed('s4', { kind: 'guild', key: '100' })).toBe(false);
      expect(transport.frames).toEqual([]);
    });
  });

  describe('removeMember', () => {
    it('unsubscribes before announcing and tells the removed user', () => {
      const alice = connectSession(rt, 's1', '1');
      const carol = connectSession(rt, 's3', '3');

      expect(rt.membership.removeMember('100', '3', 'ban')).toBe(true);

      expect(carol.transport.events()).toEqual(['GUILD_DELETE']);
      expect(carol.transport.payloads('GUILD_DELETE')).toEqual([{ id: '100' }]);
      expect(alice.transport.events()).toEqual(['GUILD_BAN_ADD', 'GUILD_MEMBER_REMOVE']);

      rt.dispatcher.dispatch('guild', '100', 'MESSAGE_CREATE', {});
      expect(carol.transport.events()).toEqual(['GUILD_DELETE']);
    });

    it('drops the member list subscription too', () => {
      const carol = connectSession(rt, 's3', '3');
      rt.memberList.subscribe(carol.session, { guild_id: '100', ranges: [[0, 99]] });

      rt.membership.removeMember('100', '3');

      expect(rt.registry.isSubscribed('s3', { kind: 'lazy-member-list', key: '100' })).toBe(false);
    });

    it('returns false for non-members', () => {
      expect(rt.membership.removeMember('100', '4')).toBe(false);
    });
  });

  describe('roles', () => {
    it('role changes update channel visibility for later dispatches', () => {
      const carol = connectSession(rt, 's3', '3');

      rt.dispatcher.dispatch('channel', '201', 'MESSAGE_CREATE', { id: 'm1' });
      expect(rt.membership.updateMemberRoles('100', '3', ['101'])).toBe(true);
      rt.dispatcher.dispatch('channel', '201', 'MESSAGE_CREATE', { id: 'm2' });

      expect(carol.transport.events()).toEqual(['GUILD_MEMBER_UPDATE', 'MESSAGE_CREATE']);
      expect(carol.transport.payloads('MESSAGE_CREATE')).toEqual([{ id: 'm2' }]);
    });

    it('announces role create and update', () => {
      const alice = connectSession(rt, 's1', '1');
      const role = { id: '102', guildId: '100', name: 'helper', position: 2, permissions: '0' };

      rt.membership.upsertRole(role);
      rt.membership.upsertRole({ ...role, name: 'helpers' });

      expect(alice.transport.events()).toEqual(['GUILD_ROLE_CREATE', 'GUILD_ROLE_UPDATE']);
    });

    it('removing a role strips it from members', () => {
      const bob = connectSession(rt, 's2', '2');

      expect(rt.membership.removeRole('100', '101')).toBe(true);
      rt.dispatcher.dispatch('channel', '201', 'MESSAGE_CREATE', {});

      expect(rt.directory.getMember('100', '2')?.roleIds).toEqual([]);
      expect(bob.transport.events()).toEqual(['GUILD_ROLE_DELETE']);
      expect(rt.membership.removeRole('100', '101')).toBe(false);
    });
  });

  describe('deleteGuild', () => {
    it('drops the guild topic and tells every member', () => {
      const alice = connectSession(rt, 's1', '1');
      const bob = connectSession(rt, 's2', '2');

      expect(rt.membership.deleteGuild('100')).toBe(true);

      expect(alice.transport.payloads('GUILD_DELETE')).toEqual([{ id: '100' }]);
      expect(bob.transport.payloads('GUILD_DELETE')).toEqual([{ id: '100' }]);
      expect(rt.registry.sessionsFor({ kind: 'guild', key: '100' })).toEqual([]);
      expect(rt.directory.getGuild('100')).toBeUndefined();
      expect(rt.membership.deleteGuild('100')).toBe(false);
    });
  });

  describe('channels', () => {
    it('subscribes DM recipients on creation', () => {
      const alice = connectSession(rt, 's1', '1');
      const carol = connectSession(rt, 's3', '3');

      rt.membership.upsertChannel({ id: '301', type: 'dm', recipientIds: ['1', '3'] });

      expect(alice.transport.events()).toEqual(['CHANNEL_CREATE']);
      expect(carol.transport.payloads('CHANNEL_CREATE')).toEqual([
        { id: '301', type: 'dm', recipient_ids: ['1', '3'] },
      ]);
      expect(rt.registry.isSubscribed('s3', { kind: 'channel', key: '301' })).toBe(true);
    });

    it('announces guild channel updates to viewers', () => {
      const alice = connectSession(rt, 's1', '1');

      rt.membership.upsertChannel({ id: '200', type: 'guild_text', guildId: '100', name: 'lobby' });

      expect(alice.transport.payloads('CHANNEL_UPDATE')).toEqual([
        {
          id: '200',
          type: 'guild_text',
          guild_id: '100',
          name: 'lobby',
          position: 0,
          permission_overwrites: [],
        },
      ]);
    });

    it('announces deletion only to sessions that could see the channel', () => {
      const bob = connectSession(rt, 's2', '2');
      const carol = connectSession(rt, 's3', '3');

      const result = rt.membership.removeChannel('201');

      expect(result?.delivered).toEqual(['s2']);
      expect(bob.transport.events()).toEqual(['CHANNEL_DELETE']);
      expect(carol.transport.frames).toEqual([]);
      expect(rt.directory.getChannel('201')).toBeUndefined();
    });

    it('drops the DM topic on deletion', () => {
      connectSession(rt, 's1', '1');

      rt.membership.removeChannel('300');

      expect(rt.registry.isSubscribed('s1', { kind: 'channel', key: '300' })).toBe(false);
      expect(rt.membership.removeChannel('300')).toBeUndefined();
    });
  });

  describe('relationships', () => {
    it('addFriend subscribes both sides and notifies each', () => {
      const alice = connectSession(rt, 's1', '1');
      const carol = connectSession(rt, 's3', '3');

      rt.membership.addFriend('1', '3');

      expect(rt.registry.isSubscribed('s1', { kind: 'friend', key: '3' })).toBe(true);
      expect(rt.registry.isSubscribed('s3', { kind: 'friend', key: '1' })).toBe(true);
      expect(alice.transport.payloads('RELATIONSHIP_ADD')).toEqual([
        {
          id: '3',
          type: 'friend',
          user: { id: '3', username: 'carol', discriminator: '0003', avatar: null, bot: false },
        },
      ]);
      expect(carol.transport.events()).toEqual(['RELATIONSHIP_ADD']);
    });

    it('removeRelationship unsubscribes both sides', () => {
      const alice = connectSession(rt, 's1', '1');
      const bob = connectSession(rt, 's2', '2');

      expect(rt.membership.removeRelationship('1', '2')).toBe(true);

      expect(rt.registry.isSubscribed('s1', { kind: 'friend', key: '2' })).toBe(false);
      expect(alice.transport.payloads('RELATIONSHIP_REMOVE')).toEqual([{ id: '2' }]);
      expect(bob.transport.payloads('RELATIONSHIP_REMOVE')).toEqual([{ id: '1' }]);
      expect(rt.membership.removeRelationship('1', '2')).toBe(false);
    });
  });
});
