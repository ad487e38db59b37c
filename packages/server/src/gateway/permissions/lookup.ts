// packages/server/src/gateway/permissions/lookup.ts
import type { ChatDirectory } from '../directory/types.js';
import { ALL_PERMISSIONS, NO_PERMISSIONS, PERMISSIONS, hasPermission, parsePermissions } from './flags.js';
import { computeBasePermissions, computePermissions } from './resolver.js';

/** 길드 레벨 권한. 멤버가 아니면 0 */
export function guildPermissions(directory: ChatDirectory, userId: string, guildId: string): bigint {
  const guild = directory.getGuild(guildId);
  const member = directory.getMember(guildId, userId);
  if (!guild || !member) {
    return NO_PERMISSIONS;
  }
  return computeBasePermissions({
    userId,
    guild,
    roles: directory.getGuildRoles(guildId),
    memberRoleIds: member.roleIds,
    baseFlags: parsePermissions(directory.getUser(userId)?.permissions),
  });
}

/**
 * 채널 유효 권한.
 * DM / 그룹 DM은 수신자에게 ALL, 그 외에는 0.
 */
export function channelPermissions(
  directory: ChatDirectory,
  userId: string,
  channelId: string,
): bigint {
  const channel = directory.getChannel(channelId);
  if (!channel) {
    return NO_PERMISSIONS;
  }

  if (channel.guildId === undefined) {
    return (channel.recipientIds ?? []).includes(userId) ? ALL_PERMISSIONS : NO_PERMISSIONS;
  }

  const guild = directory.getGuild(channel.guildId);
  const member = directory.getMember(channel.guildId, userId);
  if (!guild || !member) {
    return NO_PERMISSIONS;
  }

  return computePermissions({
    userId,
    guild,
    roles: directory.getGuildRoles(channel.guildId),
    memberRoleIds: member.roleIds,
    overwrites: channel.overwrites,
    baseFlags: parsePermissions(directory.getUser(userId)?.permissions),
  });
}

/** VIEW_CHANNEL 보유 여부 */
export function canViewChannel(directory: ChatDirectory, userId: string, channelId: string): boolean {
  return hasPermission(channelPermissions(directory, userId, channelId), PERMISSIONS.VIEW_CHANNEL);
}
