// packages/server/src/gateway/directory/snapshot.ts
import type { DirectorySnapshot } from '@parley/types';
import { readJsonFileSync } from '@parley/infra';
import { z } from 'zod/v4';
import { DirectoryError } from './errors.js';
import { InMemoryDirectory } from './memory.js';

const snowflake = z.string().regex(/^\d{1,20}$/, 'snowflake must be a decimal string');
const bitmask = z.string().regex(/^\d+$/, 'permission bitmask must be a decimal string');

const UserSchema = z.object({
  id: snowflake,
  username: z.string().min(1),
  discriminator: z.string(),
  avatar: z.string().nullable(),
  bot: z.boolean().optional(),
  permissions: bitmask.optional(),
});

const GuildSchema = z.object({
  id: snowflake,
  name: z.string(),
  ownerId: snowflake,
  icon: z.string().nullable(),
  large: z.boolean().optional(),
});

const RoleSchema = z.object({
  id: snowflake,
  guildId: snowflake,
  name: z.string(),
  position: z.number().int().min(0),
  permissions: bitmask,
  color: z.number().int().optional(),
  hoist: z.boolean().optional(),
});

const OverwriteSchema = z.object({
  id: snowflake,
  type: z.enum(['role', 'member']),
  allow: bitmask,
  deny: bitmask,
});

const ChannelSchema = z.object({
  id: snowflake,
  type: z.enum(['guild_text', 'guild_voice', 'guild_category', 'dm', 'group_dm']),
  guildId: snowflake.optional(),
  name: z.string().optional(),
  position: z.number().int().optional(),
  overwrites: z.array(OverwriteSchema).optional(),
  recipientIds: z.array(snowflake).optional(),
});

const MemberSchema = z.object({
  guildId: snowflake,
  userId: snowflake,
  nick: z.string().nullable().optional(),
  roleIds: z.array(snowflake),
  joinedAt: z.string(),
});

const RelationshipSchema = z.object({
  userId: snowflake,
  peerId: snowflake,
  type: z.enum(['friend', 'blocked', 'incoming', 'outgoing']),
});

/** 스냅샷 파일 스키마 -- 섹션 누락 시 빈 배열 */
export const DirectorySnapshotSchema = z.object({
  users: z.array(UserSchema).default([]),
  guilds: z.array(GuildSchema).default([]),
  roles: z.array(RoleSchema).default([]),
  channels: z.array(ChannelSchema).default([]),
  members: z.array(MemberSchema).default([]),
  relationships: z.array(RelationshipSchema).default([]),
});

/** 검증된 스냅샷 반환. 형식이 틀리면 DirectoryError */
export function parseDirectorySnapshot(raw: unknown): DirectorySnapshot {
  const result = DirectorySnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new DirectoryError('Invalid directory snapshot', {
      details: {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      },
    });
  }
  return result.data;
}

/**
 * JSON 스냅샷 파일을 읽어 InMemoryDirectory 생성.
 * 파일이 없으면 빈 디렉터리.
 */
export function loadDirectorySnapshot(filePath: string): InMemoryDirectory {
  let raw: unknown;
  try {
    raw = readJsonFileSync(filePath);
  } catch (err) {
    throw new DirectoryError(`Failed to read directory snapshot: ${filePath}`, {
      cause: err instanceof Error ? err : new Error(String(err)),
    });
  }
  if (raw === undefined) {
    return new InMemoryDirectory();
  }
  return InMemoryDirectory.fromSnapshot(parseDirectorySnapshot(raw));
}
