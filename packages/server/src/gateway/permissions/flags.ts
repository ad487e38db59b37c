// packages/server/src/gateway/permissions/flags.ts

/** 권한 비트 (bit index → 이름) */
export const PERMISSIONS = {
  CREATE_INSTANT_INVITE: 1n << 0n,
  KICK_MEMBERS: 1n << 1n,
  BAN_MEMBERS: 1n << 2n,
  ADMINISTRATOR: 1n << 3n,
  MANAGE_CHANNELS: 1n << 4n,
  MANAGE_GUILD: 1n << 5n,
  ADD_REACTIONS: 1n << 6n,
  VIEW_AUDIT_LOG: 1n << 7n,
  PRIORITY_SPEAKER: 1n << 8n,
  STREAM: 1n << 9n,
  VIEW_CHANNEL: 1n << 10n,
  SEND_MESSAGES: 1n << 11n,
  SEND_TTS_MESSAGES: 1n << 12n,
  MANAGE_MESSAGES: 1n << 13n,
  EMBED_LINKS: 1n << 14n,
  ATTACH_FILES: 1n << 15n,
  READ_MESSAGE_HISTORY: 1n << 16n,
  MENTION_EVERYONE: 1n << 17n,
  USE_EXTERNAL_EMOJIS: 1n << 18n,
  VIEW_GUILD_INSIGHTS: 1n << 19n,
  CONNECT: 1n << 20n,
  SPEAK: 1n << 21n,
  MUTE_MEMBERS: 1n << 22n,
  DEAFEN_MEMBERS: 1n << 23n,
  MOVE_MEMBERS: 1n << 24n,
  USE_VAD: 1n << 25n,
  CHANGE_NICKNAME: 1n << 26n,
  MANAGE_NICKNAMES: 1n << 27n,
  MANAGE_ROLES: 1n << 28n,
  MANAGE_WEBHOOKS: 1n << 29n,
  MANAGE_EMOJIS: 1n << 30n,
} as const;

export type PermissionName = keyof typeof PERMISSIONS;

/** 정의된 모든 비트의 합 */
export const ALL_PERMISSIONS: bigint = Object.values(PERMISSIONS).reduce((acc, bit) => acc | bit, 0n);

export const NO_PERMISSIONS = 0n;

/** 비트마스크에 해당 권한이 모두 있는지 */
export function hasPermission(mask: bigint, required: bigint): boolean {
  return (mask & required) === required;
}

/** 10진수 문자열 → bigint. 형식이 잘못되면 0n (권한 없음) */
export function parsePermissions(value: string | undefined): bigint {
  if (!value || !/^\d+$/.test(value)) {
    return NO_PERMISSIONS;
  }
  return BigInt(value);
}

/** 비트마스크 → 권한 이름 목록 (디버깅/로그용) */
export function describePermissions(mask: bigint): PermissionName[] {
  const names: PermissionName[] = [];
  for (const [name, bit] of Object.entries(PERMISSIONS)) {
    if ((mask & bit) === bit && isPermissionName(name)) {
      names.push(name);
    }
  }
  return names;
}

function isPermissionName(name: string): name is PermissionName {
  return name in PERMISSIONS;
}
