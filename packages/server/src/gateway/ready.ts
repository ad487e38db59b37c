// packages/server/src/gateway/ready.ts
import type { PresenceRecord, RelationshipType, Snowflake } from '@parley/types';
import type { ChatDirectory } from './directory/types.js';
import { canViewChannel } from './permissions/lookup.js';
import {
  toChannelPayload,
  toGuildSummary,
  toMemberPayload,
  toRolePayload,
  toUserPayload,
  type ChannelPayload,
  type MemberPayload,
  type RolePayload,
  type UserPayload,
} from './payloads.js';
import type { GatewaySession } from './session.js';

/** 게이트웨이 프로토콜 버전 */
export const GATEWAY_VERSION = 1;

export interface GuildPayload {
  id: Snowflake;
  name: string;
  icon: string | null;
  owner_id: Snowflake;
  large: boolean;
  member_count: number;
  roles: RolePayload[];
  /** 보는 사용자가 VIEW_CHANNEL을 가진 채널만 */
  channels: ChannelPayload[];
  /** large 길드는 본인만 */
  members: MemberPayload[];
}

export interface PresencePayload {
  user: { id: Snowflake };
  status: PresenceRecord['status'];
  activities: PresenceRecord['activities'];
  since: number | null;
  guild_id?: Snowflake;
}

export interface ReadyPayload {
  v: number;
  user: UserPayload | { id: Snowflake };
  session_id: string;
  shard: [number, number];
  guilds: GuildPayload[];
  private_channels: ChannelPayload[];
  relationships: Array<{ id: Snowflake; type: RelationshipType }>;
  presences: PresencePayload[];
}

/** 사용자 관점의 길드 페이로드. 길드가 없으면 undefined */
export function buildGuildPayload(
  directory: ChatDirectory,
  guildId: Snowflake,
  viewerId: Snowflake,
  largeThreshold: number,
): GuildPayload | undefined {
  const guild = directory.getGuild(guildId);
  if (!guild) {
    return undefined;
  }
  const members = directory.getGuildMembers(guildId);
  const large = guild.large === true || members.length > largeThreshold;
  const listed = large ? members.filter((member) => member.userId === viewerId) : members;

  return {
    ...toGuildSummary(guild),
    large,
    member_count: members.length,
    roles: directory.getGuildRoles(guildId).map(toRolePayload),
    channels: directory
      .getGuildChannels(guildId)
      .filter((channel) => canViewChannel(directory, viewerId, channel.id))
      .map(toChannelPayload),
    members: listed.map((member) => toMemberPayload(member, directory.getUser(member.userId))),
  };
}

/**
 * READY 부트스트랩 스냅샷
 *
 * @param guildIds 세션 샤드가 담당하는 길드
 * @param presenceOf 친구의 현재 presence (오프라인이면 undefined)
 */
export function buildReadyPayload(
  directory: ChatDirectory,
  session: GatewaySession,
  guildIds: readonly Snowflake[],
  presenceOf: (userId: Snowflake) => PresenceRecord | undefined = () => undefined,
): ReadyPayload {
  const user = directory.getUser(session.userId);
  const relationships = directory.getRelationships(session.userId);

  const guilds: GuildPayload[] = [];
  for (const guildId of guildIds) {
    const guild = buildGuildPayload(directory, guildId, session.userId, session.largeThreshold);
    if (guild) {
      guilds.push(guild);
    }
  }

  const presences: PresencePayload[] = [];
  for (const rel of relationships) {
    if (rel.type !== 'friend') {
      continue;
    }
    const presence = presenceOf(rel.peerId);
    if (presence) {
      presences.push({
        user: { id: rel.peerId },
        status: presence.status,
        activities: presence.activities,
        since: presence.since,
      });
    }
  }

  return {
    v: GATEWAY_VERSION,
    user: user ? toUserPayload(user) : { id: session.userId },
    session_id: session.id,
    shard: [session.shard.id, session.shard.count],
    guilds,
    private_channels: directory.getPrivateChannels(session.userId).map(toChannelPayload),
    relationships: relationships.map((rel) => ({ id: rel.peerId, type: rel.type })),
    presences,
  };
}
