// packages/server/src/gateway/sharding.ts
import { GATEWAY_CLOSE_CODES, type ShardInfo, type Snowflake } from '@parley/types';
import { GatewayCloseError } from './errors.js';

/** 길드가 속한 샤드: (guild_id >> 22) % shard_count */
export function shardOf(guildId: Snowflake, shardCount: number): number {
  return Number((BigInt(guildId) >> 22n) % BigInt(shardCount));
}

/** 세션이 해당 길드를 담당하는지 */
export function ownsGuild(shard: ShardInfo, guildId: Snowflake): boolean {
  return shardOf(guildId, shard.count) === shard.id;
}

/** IDENTIFY의 shard 배열 검증. 없으면 [0, 1] */
export function parseShard(shard: readonly [number, number] | undefined): ShardInfo {
  if (shard === undefined) {
    return { id: 0, count: 1 };
  }
  const [id, count] = shard;
  if (count < 1 || id < 0 || id >= count) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.INVALID_SHARD, undefined, {
      details: { shard: [id, count] },
    });
  }
  return { id, count };
}

/** 샤드가 담당할 길드 목록. maxGuildsPerShard 초과 시 SHARDING_REQUIRED */
export function guildsForShard(
  guildIds: readonly Snowflake[],
  shard: ShardInfo,
  maxGuildsPerShard: number,
): Snowflake[] {
  const owned = guildIds.filter((guildId) => ownsGuild(shard, guildId));
  if (owned.length > maxGuildsPerShard) {
    throw new GatewayCloseError(GATEWAY_CLOSE_CODES.SHARDING_REQUIRED, undefined, {
      details: { guilds: owned.length, maxGuildsPerShard },
    });
  }
  return owned;
}
