// packages/server/src/gateway/membership.ts
import type {
  ChannelRecord,
  DispatchResult,
  MemberRecord,
  RoleRecord,
  Snowflake,
  Topic,
} from '@parley/types';
import type { ParleyLogger } from '@parley/infra';
import type { InMemoryDirectory } from './directory/memory.js';
import type { EventDispatcher } from './dispatcher.js';
import type { MemberListService } from './member-list.js';
import { toChannelPayload, toMemberPayload, toRolePayload, toUserPayload } from './payloads.js';
import { buildGuildPayload } from './ready.js';
import type { SessionRegistry } from './registry.js';
import type { GatewaySession } from './session.js';
import { ownsGuild } from './sharding.js';

export type MemberRemovalReason = 'leave' | 'kick' | 'ban';

export interface MembershipCoordinatorDeps {
  readonly directory: InMemoryDirectory;
  readonly registry: SessionRegistry;
  readonly dispatcher: EventDispatcher;
  readonly memberList: MemberListService;
  readonly logger: ParleyLogger;
}

const guildTopic = (guildId: Snowflake): Topic => ({ kind: 'guild', key: guildId });
const lazyTopic = (guildId: Snowflake): Topic => ({ kind: 'lazy-member-list', key: guildId });
const friendTopic = (userId: Snowflake): Topic => ({ kind: 'friend', key: userId });

/**
 * 멤버십/관계 변경 조정자
 *
 * 디렉터리 갱신 → 레지스트리 구독 갱신 → 이벤트 발행을 한 동기 단계에서 수행한다.
 * 길드를 떠난 사용자의 세션은 이 호출이 반환되기 전에 길드 토픽에서 빠지므로
 * 이후 디스패치는 그 세션에 도달하지 않는다.
 */
export class MembershipCoordinator {
  private readonly directory: InMemoryDirectory;
  private readonly registry: SessionRegistry;
  private readonly dispatcher: EventDispatcher;
  private readonly memberList: MemberListService;
  private readonly logger: ParleyLogger;

  constructor(deps: MembershipCoordinatorDeps) {
    this.directory = deps.directory;
    this.registry = deps.registry;
    this.dispatcher = deps.dispatcher;
    this.memberList = deps.memberList;
    this.logger = deps.logger;
  }

  /**
   * 새 세션의 암묵적 구독: 샤드 길드, DM 채널, 친구들의 friend 토픽.
   * 사용자 토픽은 레지스트리의 사용자 인덱스가 대신한다.
   */
  subscribeSession(session: GatewaySession, guildIds: readonly Snowflake[]): void {
    for (const guildId of guildIds) {
      this.registry.subscribe(session.id, guildTopic(guildId));
    }
    for (const channel of this.directory.getPrivateChannels(session.userId)) {
      this.registry.subscribe(session.id, { kind: 'channel', key: channel.id });
    }
    for (const rel of this.directory.getRelationships(session.userId)) {
      if (rel.type === 'friend') {
        this.registry.subscribe(session.id, friendTopic(rel.peerId));
      }
    }
  }

  // ─── 길드 멤버 ───

  /** 길드 가입: 샤드가 맞는 세션을 구독시키고 GUILD_CREATE / GUILD_MEMBER_ADD */
  addMember(member: MemberRecord): void {
    const { guildId, userId } = member;
    this.directory.addMember(member);
    this.registry.subscribeUser(userId, guildTopic(guildId), (session) =>
      ownsGuild(session.shard, guildId),
    );

    for (const session of this.registry.sessionsForUser(userId)) {
      if (!ownsGuild(session.shard, guildId)) {
        continue;
      }
      const guild = buildGuildPayload(this.directory, guildId, userId, session.largeThreshold);
      if (guild) {
        session.deliver('GUILD_CREATE', JSON.stringify(guild));
      }
    }

    this.dispatcher.dispatch('guild', guildId, 'GUILD_MEMBER_ADD', {
      guild_id: guildId,
      ...toMemberPayload(member, this.directory.getUser(userId)),
    });
    this.memberList.notifyChanged(guildId);
    this.logger.debug(`Member ${userId} joined guild ${guildId}`);
  }

  /** 탈퇴/추방/차단: 구독을 먼저 끊고 본인에게 GUILD_DELETE */
  removeMember(guildId: Snowflake, userId: Snowflake, reason: MemberRemovalReason = 'leave'): boolean {
    const member = this.directory.removeMember(guildId, userId);
    if (!member) {
      return false;
    }
    this.registry.unsubscribeUser(userId, guildTopic(guildId));
    this.registry.unsubscribeUser(userId, lazyTopic(guildId));

    this.dispatcher.dispatch('user', userId, 'GUILD_DELETE', { id: guildId });

    const user = this.directory.getUser(userId);
    const userPayload = user ? toUserPayload(user) : { id: userId };
    if (reason === 'ban') {
      this.dispatcher.dispatch('guild', guildId, 'GUILD_BAN_ADD', {
        guild_id: guildId,
        user: userPayload,
      });
    }
    this.dispatcher.dispatch('guild', guildId, 'GUILD_MEMBER_REMOVE', {
      guild_id: guildId,
      user: userPayload,
    });
    this.memberList.notifyChanged(guildId);
    this.logger.debug(`Member ${userId} removed from guild ${guildId} (${reason})`);
    return true;
  }

  /** 멤버 역할 변경 */
  updateMemberRoles(guildId: Snowflake, userId: Snowflake, roleIds: Snowflake[]): boolean {
    const member = this.directory.getMember(guildId, userId);
    if (!member) {
      return false;
    }
    const updated: MemberRecord = { ...member, roleIds };
    this.directory.addMember(updated);
    this.dispatcher.dispatch('guild', guildId, 'GUILD_MEMBER_UPDATE', {
      guild_id: guildId,
      ...toMemberPayload(updated, this.directory.getUser(userId)),
    });
    return true;
  }

  // ─── 역할 ───

  upsertRole(role: RoleRecord): DispatchResult {
    const created = !this.directory.getGuildRoles(role.guildId).some((r) => r.id === role.id);
    this.directory.upsertRole(role);
    return this.dispatcher.dispatch(
      'guild',
      role.guildId,
      created ? 'GUILD_ROLE_CREATE' : 'GUILD_ROLE_UPDATE',
      { guild_id: role.guildId, role: toRolePayload(role) },
    );
  }

  removeRole(guildId: Snowflake, roleId: Snowflake): boolean {
    if (!this.directory.removeRole(guildId, roleId)) {
      return false;
    }
    this.dispatcher.dispatch('guild', guildId, 'GUILD_ROLE_DELETE', {
      guild_id: guildId,
      role_id: roleId,
    });
    return true;
  }

  // ─── 길드 / 채널 ───

  /** 길드 삭제: 모든 멤버 세션의 구독 해제 후 GUILD_DELETE */
  deleteGuild(guildId: Snowflake): boolean {
    if (!this.directory.getGuild(guildId)) {
      return false;
    }
    const memberIds = this.directory.removeGuild(guildId);
    this.registry.dropTopic(guildTopic(guildId));
    this.registry.dropTopic(lazyTopic(guildId));
    this.dispatcher.dispatchMany('user', memberIds, 'GUILD_DELETE', () => ({ id: guildId }));
    return true;
  }

  /** 채널 생성/수정. DM은 수신자 세션을 채널 토픽에 구독시킨다 */
  upsertChannel(channel: ChannelRecord): DispatchResult {
    const created = this.directory.getChannel(channel.id) === undefined;
    this.directory.upsertChannel(channel);

    if (channel.guildId === undefined) {
      for (const recipientId of channel.recipientIds ?? []) {
        this.registry.subscribeUser(recipientId, { kind: 'channel', key: channel.id });
      }
    }
    return this.dispatcher.dispatch(
      'channel',
      channel.id,
      created ? 'CHANNEL_CREATE' : 'CHANNEL_UPDATE',
      toChannelPayload(channel),
    );
  }

  /** 채널 삭제: 볼 수 있던 세션에 먼저 알린 뒤 제거 */
  removeChannel(channelId: Snowflake): DispatchResult | undefined {
    const channel = this.directory.getChannel(channelId);
    if (!channel) {
      return undefined;
    }
    const result = this.dispatcher.dispatch(
      'channel',
      channelId,
      'CHANNEL_DELETE',
      toChannelPayload(channel),
    );
    this.directory.removeChannel(channelId);
    if (channel.guildId === undefined) {
      this.registry.dropTopic({ kind: 'channel', key: channelId });
    }
    return result;
  }

  // ─── 관계 ───

  /** 친구 수락: 양쪽 세션을 서로의 friend 토픽에 구독 */
  addFriend(userId: Snowflake, peerId: Snowflake): void {
    this.directory.setRelationship(userId, peerId, 'friend');
    this.directory.setRelationship(peerId, userId, 'friend');
    this.registry.subscribeUser(userId, friendTopic(peerId));
    this.registry.subscribeUser(peerId, friendTopic(userId));
    this.notifyRelationship('RELATIONSHIP_ADD', userId, peerId, 'friend');
    this.notifyRelationship('RELATIONSHIP_ADD', peerId, userId, 'friend');
  }

  /** 관계 제거: 양쪽 구독 해제 */
  removeRelationship(userId: Snowflake, peerId: Snowflake): boolean {
    const removed = this.directory.removeRelationship(userId, peerId);
    const reverse = this.directory.removeRelationship(peerId, userId);
    if (!removed && !reverse) {
      return false;
    }
    this.registry.unsubscribeUser(userId, friendTopic(peerId));
    this.registry.unsubscribeUser(peerId, friendTopic(userId));
    if (removed) {
      this.dispatcher.dispatch('user', userId, 'RELATIONSHIP_REMOVE', { id: peerId });
    }
    if (reverse) {
      this.dispatcher.dispatch('user', peerId, 'RELATIONSHIP_REMOVE', { id: userId });
    }
    return true;
  }

  private notifyRelationship(
    eventType: string,
    userId: Snowflake,
    peerId: Snowflake,
    type: 'friend',
  ): void {
    const peer = this.directory.getUser(peerId);
    this.dispatcher.dispatch('user', userId, eventType, {
      id: peerId,
      type,
      user: peer ? toUserPayload(peer) : { id: peerId },
    });
  }
}
