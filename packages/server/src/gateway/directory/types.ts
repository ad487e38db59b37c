// packages/server/src/gateway/directory/types.ts
import type {
  ChannelRecord,
  GuildRecord,
  MemberRecord,
  RelationshipRecord,
  RoleRecord,
  UserRecord,
} from '@parley/types';

/**
 * 스토리지 계층이 미리 채워 둔 메모리 읽기 모델.
 * 디스패치 경로에서 블로킹 I/O가 없도록 모든 조회는 동기식이다.
 */
export interface ChatDirectory {
  getUser(userId: string): UserRecord | undefined;
  getGuild(guildId: string): GuildRecord | undefined;
  getGuildRoles(guildId: string): readonly RoleRecord[];
  getGuildChannels(guildId: string): readonly ChannelRecord[];
  getChannel(channelId: string): ChannelRecord | undefined;
  getMember(guildId: string, userId: string): MemberRecord | undefined;
  getGuildMembers(guildId: string): readonly MemberRecord[];
  getUserGuildIds(userId: string): readonly string[];
  /** 사용자가 수신자인 DM / 그룹 DM */
  getPrivateChannels(userId: string): readonly ChannelRecord[];
  getRelationships(userId: string): readonly RelationshipRecord[];
}
