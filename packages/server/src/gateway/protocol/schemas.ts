// packages/server/src/gateway/protocol/schemas.ts
import { z } from 'zod/v4';

/**
 * 클라이언트 → 서버 프레임 스키마
 *
 * 봉투 `{ op, d, s, t }`를 먼저 검증하고, opcode별 `d`를 따로 검증한다.
 */

const snowflake = z.string().regex(/^\d{1,20}$/);

export const FrameEnvelopeSchema = z.object({
  op: z.number().int(),
  d: z.unknown(),
  s: z.number().int().nullable().optional(),
  t: z.string().nullable().optional(),
});

export const HeartbeatSchema = z.number().int().min(0).nullable();

export const ActivitySchema = z.strictObject({
  name: z.string().min(1).max(128),
  type: z.number().int().min(0).max(5),
  url: z.string().nullable().optional(),
});

export const PresenceSchema = z.strictObject({
  status: z.enum(['online', 'idle', 'dnd', 'invisible', 'offline']),
  since: z.number().int().min(0).nullable(),
  afk: z.boolean(),
  activities: z.array(ActivitySchema).max(8),
});

export const IdentifySchema = z.object({
  token: z.string().min(1),
  properties: z.record(z.string(), z.string()).optional(),
  shard: z.tuple([z.number().int(), z.number().int()]).optional(),
  presence: PresenceSchema.optional(),
  large_threshold: z.number().int().min(50).max(250).optional(),
});

export const ResumeSchema = z.object({
  token: z.string().min(1),
  session_id: z.string().min(1),
  seq: z.number().int().min(0),
});

export const RequestGuildMembersSchema = z.object({
  guild_id: snowflake,
  query: z.string().max(100).optional(),
  limit: z.number().int().min(0).max(100).optional(),
  user_ids: z.array(snowflake).max(100).optional(),
});

const MemberListRangeSchema = z
  .tuple([z.number().int().min(0), z.number().int().min(0)])
  .refine(([start, end]) => start <= end, 'range start must not exceed end');

export const LazyRequestSchema = z.object({
  guild_id: snowflake,
  ranges: z.array(MemberListRangeSchema).min(1).max(5),
});
