// packages/server/src/gateway/member-list.ts
import type {
  DispatchResult,
  LazyRequestPayload,
  PresenceStatus,
  RequestGuildMembersPayload,
  Snowflake,
} from '@parley/types';
import type { ParleyLogger } from '@parley/infra';
import type { ChatDirectory } from './directory/types.js';
import type { EventDispatcher } from './dispatcher.js';
import type { PresenceService } from './presence.js';
import { toMemberPayload, type MemberPayload } from './payloads.js';
import { serializePayload } from './protocol/codec.js';
import type { SessionRegistry } from './registry.js';
import type { GatewaySession } from './session.js';

/** 변경 시 구독자에게 다시 보내는 구간 */
const DEFAULT_SYNC_RANGE: [number, number] = [0, 99];
/** GUILD_MEMBERS_CHUNK 한 프레임당 최대 멤버 수 */
export const MEMBERS_CHUNK_SIZE = 1000;

export interface MemberListItem {
  member: MemberPayload & { presence: { status: PresenceStatus } };
}

export interface MemberListUpdatePayload {
  guild_id: Snowflake;
  id: 'everyone';
  member_count: number;
  online_count: number;
  ops: Array<{ op: 'SYNC'; range: [number, number]; items: MemberListItem[] }>;
}

export interface MembersChunkPayload {
  guild_id: Snowflake;
  members: MemberPayload[];
  chunk_index: number;
  chunk_count: number;
  not_found?: Snowflake[];
}

export interface MemberListServiceDeps {
  readonly registry: SessionRegistry;
  readonly directory: ChatDirectory;
  readonly dispatcher: EventDispatcher;
  readonly presence: Pick<PresenceService, 'current'>;
  readonly logger: ParleyLogger;
}

/**
 * 길드 멤버 목록
 *
 * - LAZY_REQUEST (op 14): lazy-member-list 토픽 구독 + 요청 구간 SYNC
 * - REQUEST_GUILD_MEMBERS (op 8): GUILD_MEMBERS_CHUNK 응답
 * - 멤버/presence 변경 시 구독자에게 첫 구간 SYNC 재전송
 *
 * 온라인 멤버가 먼저, 그 안에서 표시 이름 순.
 */
export class MemberListService {
  private readonly registry: SessionRegistry;
  private readonly directory: ChatDirectory;
  private readonly dispatcher: EventDispatcher;
  private readonly presence: Pick<PresenceService, 'current'>;
  private readonly logger: ParleyLogger;

  constructor(deps: MemberListServiceDeps) {
    this.registry = deps.registry;
    this.directory = deps.directory;
    this.dispatcher = deps.dispatcher;
    this.presence = deps.presence;
    this.logger = deps.logger;
  }

  /** 멤버 목록 구독. 길드 멤버가 아니면 false */
  subscribe(session: GatewaySession, request: LazyRequestPayload): boolean {
    if (!this.directory.getMember(request.guild_id, session.userId)) {
      this.logger.debug(`Lazy request for ${request.guild_id} from non-member ${session.userId}`);
      return false;
    }
    this.registry.subscribe(session.id, { kind: 'lazy-member-list', key: request.guild_id });
    const payload = this.buildSync(request.guild_id, request.ranges);
    session.deliver('GUILD_MEMBER_LIST_UPDATE', serializePayload(payload));
    return true;
  }

  /** 멤버 목록이 바뀌었을 때. 구독자가 없으면 아무것도 하지 않는다 */
  notifyChanged(guildId: Snowflake): DispatchResult | undefined {
    const topic = { kind: 'lazy-member-list', key: guildId } as const;
    if (this.registry.sessionsFor(topic).length === 0) {
      return undefined;
    }
    return this.dispatcher.dispatch(
      'lazy-member-list',
      guildId,
      'GUILD_MEMBER_LIST_UPDATE',
      this.buildSync(guildId, [DEFAULT_SYNC_RANGE]),
    );
  }

  /** GUILD_MEMBERS_CHUNK 전송. 보낸 청크 수 반환 (멤버가 아니면 0) */
  requestMembers(session: GatewaySession, request: RequestGuildMembersPayload): number {
    const guildId = request.guild_id;
    if (!this.directory.getMember(guildId, session.userId)) {
      this.logger.debug(`Member request for ${guildId} from non-member ${session.userId}`);
      return 0;
    }

    const notFound: Snowflake[] = [];
    let members: MemberPayload[];

    if (request.user_ids !== undefined) {
      members = [];
      for (const userId of request.user_ids) {
        const member = this.directory.getMember(guildId, userId);
        if (member) {
          members.push(toMemberPayload(member, this.directory.getUser(userId)));
        } else {
          notFound.push(userId);
        }
      }
    } else {
      const query = (request.query ?? '').toLowerCase();
      const matched = this.directory.getGuildMembers(guildId).filter((member) => {
        if (query === '') {
          return true;
        }
        const username = this.directory.getUser(member.userId)?.username.toLowerCase() ?? '';
        return username.startsWith(query) || (member.nick?.toLowerCase().startsWith(query) ?? false);
      });
      const limit = request.limit ?? 0;
      members = (limit > 0 ? matched.slice(0, limit) : matched).map((member) =>
        toMemberPayload(member, this.directory.getUser(member.userId)),
      );
    }

    const chunkCount = Math.max(1, Math.ceil(members.length / MEMBERS_CHUNK_SIZE));
    for (let index = 0; index < chunkCount; index++) {
      const chunk: MembersChunkPayload = {
        guild_id: guildId,
        members: members.slice(index * MEMBERS_CHUNK_SIZE, (index + 1) * MEMBERS_CHUNK_SIZE),
        chunk_index: index,
        chunk_count: chunkCount,
        ...(index === 0 && notFound.length > 0 && { not_found: notFound }),
      };
      session.deliver('GUILD_MEMBERS_CHUNK', serializePayload(chunk));
    }
    return chunkCount;
  }

  /** 정렬된 전체 멤버 목록 */
  buildList(guildId: Snowflake): MemberListItem[] {
    const items = this.directory.getGuildMembers(guildId).map((member) => {
      const user = this.directory.getUser(member.userId);
      return {
        name: member.nick ?? user?.username ?? member.userId,
        item: {
          member: {
            ...toMemberPayload(member, user),
            presence: { status: this.statusOf(member.userId) },
          },
        },
      };
    });

    items.sort((a, b) => {
      const aOnline = a.item.member.presence.status !== 'offline';
      const bOnline = b.item.member.presence.status !== 'offline';
      if (aOnline !== bOnline) {
        return aOnline ? -1 : 1;
      }
      return a.name.localeCompare(b.name);
    });
    return items.map((entry) => entry.item);
  }

  private buildSync(
    guildId: Snowflake,
    ranges: ReadonlyArray<readonly [number, number]>,
  ): MemberListUpdatePayload {
    const list = this.buildList(guildId);
    return {
      guild_id: guildId,
      id: 'everyone',
      member_count: list.length,
      online_count: list.filter((item) => item.member.presence.status !== 'offline').length,
      ops: ranges.map(([start, end]): MemberListUpdatePayload['ops'][number] => ({
        op: 'SYNC',
        range: [start, end],
        items: list.slice(start, end + 1),
      })),
    };
  }

  private statusOf(userId: Snowflake): PresenceStatus {
    return this.presence.current(userId)?.status ?? 'offline';
  }
}
