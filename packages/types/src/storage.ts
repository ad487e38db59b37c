import type { Snowflake } from './common.js';

/**
 * 스토리지 계층이 채워 넣는 읽기 전용 레코드.
 * 권한 비트마스크는 와이어에서 10진수 문자열, 메모리에서는 bigint.
 */

/** 사용자 */
export interface UserRecord {
  id: Snowflake;
  username: string;
  discriminator: string;
  avatar: string | null;
  bot?: boolean;
  /** 계정 기본 권한 플래그 (선택) */
  permissions?: string;
}

/** 길드 */
export interface GuildRecord {
  id: Snowflake;
  name: string;
  ownerId: Snowflake;
  icon: string | null;
  large?: boolean;
}

/** 역할 -- @everyone 역할의 id는 길드 id와 같다 */
export interface RoleRecord {
  id: Snowflake;
  guildId: Snowflake;
  name: string;
  position: number;
  permissions: string;
  color?: number;
  hoist?: boolean;
}

export type OverwriteType = 'role' | 'member';

/** 채널 권한 덮어쓰기 */
export interface OverwriteRecord {
  id: Snowflake;
  type: OverwriteType;
  allow: string;
  deny: string;
}

export type ChannelType = 'guild_text' | 'guild_voice' | 'guild_category' | 'dm' | 'group_dm';

/** 채널 -- guildId가 없으면 DM / 그룹 DM */
export interface ChannelRecord {
  id: Snowflake;
  type: ChannelType;
  guildId?: Snowflake;
  name?: string;
  position?: number;
  overwrites?: OverwriteRecord[];
  /** DM / 그룹 DM 수신자 */
  recipientIds?: Snowflake[];
}

/** 길드 멤버 */
export interface MemberRecord {
  guildId: Snowflake;
  userId: Snowflake;
  nick?: string | null;
  roleIds: Snowflake[];
  joinedAt: string;
}

export type RelationshipType = 'friend' | 'blocked' | 'incoming' | 'outgoing';

/** userId 관점의 관계 */
export interface RelationshipRecord {
  userId: Snowflake;
  peerId: Snowflake;
  type: RelationshipType;
}

export type PresenceStatus = 'online' | 'idle' | 'dnd' | 'invisible' | 'offline';

export interface ActivityRecord {
  name: string;
  type: number;
  url?: string | null;
}

export interface PresenceRecord {
  status: PresenceStatus;
  since: number | null;
  afk: boolean;
  activities: ActivityRecord[];
}

/** 디렉터리 스냅샷 파일 형식 */
export interface DirectorySnapshot {
  users: UserRecord[];
  guilds: GuildRecord[];
  roles: RoleRecord[];
  channels: ChannelRecord[];
  members: MemberRecord[];
  relationships: RelationshipRecord[];
}
