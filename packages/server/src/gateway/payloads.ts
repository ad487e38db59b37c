// packages/server/src/gateway/payloads.ts
import type {
  ChannelRecord,
  GuildRecord,
  MemberRecord,
  OverwriteRecord,
  RoleRecord,
  Snowflake,
  UserRecord,
} from '@parley/types';

/**
 * 레코드 → 와이어 페이로드 변환 (snake_case)
 */

export interface UserPayload {
  id: Snowflake;
  username: string;
  discriminator: string;
  avatar: string | null;
  bot: boolean;
}

export interface RolePayload {
  id: Snowflake;
  name: string;
  position: number;
  permissions: string;
  color: number;
  hoist: boolean;
}

export interface OverwritePayload {
  id: Snowflake;
  type: 'role' | 'member';
  allow: string;
  deny: string;
}

export interface ChannelPayload {
  id: Snowflake;
  type: ChannelRecord['type'];
  guild_id?: Snowflake;
  name?: string;
  position?: number;
  permission_overwrites?: OverwritePayload[];
  recipient_ids?: Snowflake[];
}

export interface MemberPayload {
  user: UserPayload | { id: Snowflake };
  nick: string | null;
  roles: Snowflake[];
  joined_at: string;
}

export function toUserPayload(user: UserRecord): UserPayload {
  return {
    id: user.id,
    username: user.username,
    discriminator: user.discriminator,
    avatar: user.avatar,
    bot: user.bot ?? false,
  };
}

export function toRolePayload(role: RoleRecord): RolePayload {
  return {
    id: role.id,
    name: role.name,
    position: role.position,
    permissions: role.permissions,
    color: role.color ?? 0,
    hoist: role.hoist ?? false,
  };
}

function toOverwritePayload(overwrite: OverwriteRecord): OverwritePayload {
  return { id: overwrite.id, type: overwrite.type, allow: overwrite.allow, deny: overwrite.deny };
}

export function toChannelPayload(channel: ChannelRecord): ChannelPayload {
  if (channel.guildId === undefined) {
    return {
      id: channel.id,
      type: channel.type,
      ...(channel.name !== undefined && { name: channel.name }),
      recipient_ids: channel.recipientIds ?? [],
    };
  }
  return {
    id: channel.id,
    type: channel.type,
    guild_id: channel.guildId,
    name: channel.name,
    position: channel.position ?? 0,
    permission_overwrites: (channel.overwrites ?? []).map(toOverwritePayload),
  };
}

export function toMemberPayload(member: MemberRecord, user: UserRecord | undefined): MemberPayload {
  return {
    user: user ? toUserPayload(user) : { id: member.userId },
    nick: member.nick ?? null,
    roles: member.roleIds,
    joined_at: member.joinedAt,
  };
}

export function toGuildSummary(guild: GuildRecord): {
  id: Snowflake;
  name: string;
  icon: string | null;
  owner_id: Snowflake;
} {
  return { id: guild.id, name: guild.name, icon: guild.icon, owner_id: guild.ownerId };
}
