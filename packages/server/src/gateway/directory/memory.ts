// packages/server/src/gateway/directory/memory.ts
import type {
  ChannelRecord,
  DirectorySnapshot,
  GuildRecord,
  MemberRecord,
  RelationshipRecord,
  RelationshipType,
  RoleRecord,
  UserRecord,
} from '@parley/types';
import type { ChatDirectory } from './types.js';

/**
 * Map 기반 ChatDirectory 구현.
 *
 * 변경 메서드는 레코드만 갱신한다. 레지스트리 구독과 이벤트 발행은
 * MembershipCoordinator가 같은 동기 단계 안에서 함께 처리한다.
 */
export class InMemoryDirectory implements ChatDirectory {
  private readonly users = new Map<string, UserRecord>();
  private readonly guilds = new Map<string, GuildRecord>();
  private readonly roles = new Map<string, Map<string, RoleRecord>>();
  private readonly channels = new Map<string, ChannelRecord>();
  /** guildId → userId → member */
  private readonly members = new Map<string, Map<string, MemberRecord>>();
  /** userId → guildId 집합 */
  private readonly guildsByUser = new Map<string, Set<string>>();
  /** userId → peerId → relationship */
  private readonly relationships = new Map<string, Map<string, RelationshipRecord>>();

  static fromSnapshot(snapshot: DirectorySnapshot): InMemoryDirectory {
    const directory = new InMemoryDirectory();
    for (const user of snapshot.users) directory.upsertUser(user);
    for (const guild of snapshot.guilds) directory.upsertGuild(guild);
    for (const role of snapshot.roles) directory.upsertRole(role);
    for (const channel of snapshot.channels) directory.upsertChannel(channel);
    for (const member of snapshot.members) directory.addMember(member);
    for (const rel of snapshot.relationships) directory.setRelationship(rel.userId, rel.peerId, rel.type);
    return directory;
  }

  // ─── 조회 ───

  getUser(userId: string): UserRecord | undefined {
    return this.users.get(userId);
  }

  getGuild(guildId: string): GuildRecord | undefined {
    return this.guilds.get(guildId);
  }

  getGuildRoles(guildId: string): readonly RoleRecord[] {
    return [...(this.roles.get(guildId)?.values() ?? [])];
  }

  getGuildChannels(guildId: string): readonly ChannelRecord[] {
    return [...this.channels.values()].filter((channel) => channel.guildId === guildId);
  }

  getChannel(channelId: string): ChannelRecord | undefined {
    return this.channels.get(channelId);
  }

  getMember(guildId: string, userId: string): MemberRecord | undefined {
    return this.members.get(guildId)?.get(userId);
  }

  getGuildMembers(guildId: string): readonly MemberRecord[] {
    return [...(this.members.get(guildId)?.values() ?? [])];
  }

  getUserGuildIds(userId: string): readonly string[] {
    return [...(this.guildsByUser.get(userId) ?? [])];
  }

  getPrivateChannels(userId: string): readonly ChannelRecord[] {
    return [...this.channels.values()].filter(
      (channel) => channel.guildId === undefined && (channel.recipientIds ?? []).includes(userId),
    );
  }

  getRelationships(userId: string): readonly RelationshipRecord[] {
    return [...(this.relationships.get(userId)?.values() ?? [])];
  }

  // ─── 변경 ───

  upsertUser(user: UserRecord): void {
    this.users.set(user.id, user);
  }

  upsertGuild(guild: GuildRecord): void {
    this.guilds.set(guild.id, guild);
  }

  /** 길드와 그 역할/채널/멤버 전체 제거. 제거된 멤버의 userId 목록 반환 */
  removeGuild(guildId: string): string[] {
    const memberIds = [...(this.members.get(guildId)?.keys() ?? [])];
    for (const userId of memberIds) {
      this.removeMember(guildId, userId);
    }
    for (const channel of this.getGuildChannels(guildId)) {
      this.channels.delete(channel.id);
    }
    this.roles.delete(guildId);
    this.members.delete(guildId);
    this.guilds.delete(guildId);
    return memberIds;
  }

  upsertRole(role: RoleRecord): void {
    let guildRoles = this.roles.get(role.guildId);
    if (!guildRoles) {
      guildRoles = new Map();
      this.roles.set(role.guildId, guildRoles);
    }
    guildRoles.set(role.id, role);
  }

  removeRole(guildId: string, roleId: string): boolean {
    const removed = this.roles.get(guildId)?.delete(roleId) ?? false;
    if (removed) {
      for (const member of this.getGuildMembers(guildId)) {
        if (member.roleIds.includes(roleId)) {
          this.addMember({ ...member, roleIds: member.roleIds.filter((id) => id !== roleId) });
        }
      }
    }
    return removed;
  }

  upsertChannel(channel: ChannelRecord): void {
    this.channels.set(channel.id, channel);
  }

  removeChannel(channelId: string): ChannelRecord | undefined {
    const channel = this.channels.get(channelId);
    this.channels.delete(channelId);
    return channel;
  }

  /** 멤버 추가 또는 교체 */
  addMember(member: MemberRecord): void {
    let guildMembers = this.members.get(member.guildId);
    if (!guildMembers) {
      guildMembers = new Map();
      this.members.set(member.guildId, guildMembers);
    }
    guildMembers.set(member.userId, member);

    let userGuilds = this.guildsByUser.get(member.userId);
    if (!userGuilds) {
      userGuilds = new Set();
      this.guildsByUser.set(member.userId, userGuilds);
    }
    userGuilds.add(member.guildId);
  }

  removeMember(guildId: string, userId: string): MemberRecord | undefined {
    const member = this.members.get(guildId)?.get(userId);
    if (!member) {
      return undefined;
    }
    this.members.get(guildId)?.delete(userId);
    const userGuilds = this.guildsByUser.get(userId);
    userGuilds?.delete(guildId);
    if (userGuilds?.size === 0) {
      this.guildsByUser.delete(userId);
    }
    return member;
  }

  setRelationship(userId: string, peerId: string, type: RelationshipType): void {
    let rels = this.relationships.get(userId);
    if (!rels) {
      rels = new Map();
      this.relationships.set(userId, rels);
    }
    rels.set(peerId, { userId, peerId, type });
  }

  removeRelationship(userId: string, peerId: string): RelationshipRecord | undefined {
    const rel = this.relationships.get(userId)?.get(peerId);
    this.relationships.get(userId)?.delete(peerId);
    return rel;
  }
}
