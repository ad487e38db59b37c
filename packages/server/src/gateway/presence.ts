// packages/server/src/gateway/presence.ts
import type { DispatchResult, PresenceRecord, Snowflake } from '@parley/types';
import type { ParleyLogger } from '@parley/infra';
import type { ChatDirectory } from './directory/types.js';
import type { EventDispatcher } from './dispatcher.js';
import type { PresencePayload } from './ready.js';
import type { SessionRegistry } from './registry.js';
import type { GatewaySession } from './session.js';

export interface PresenceServiceDeps {
  readonly registry: SessionRegistry;
  readonly directory: ChatDirectory;
  readonly dispatcher: EventDispatcher;
  readonly logger: ParleyLogger;
  /** 길드 멤버의 presence가 바뀌었을 때 (멤버 목록 재동기화) */
  readonly onGuildPresenceChange?: (guildId: Snowflake) => void;
}

const OFFLINE: Readonly<PresenceRecord> = Object.freeze({
  status: 'offline',
  since: null,
  afk: false,
  activities: [],
});

/** invisible은 다른 사용자에게 offline으로 보인다 */
function toVisible(presence: PresenceRecord): PresenceRecord {
  return presence.status === 'invisible' ? { ...presence, status: 'offline', activities: [] } : presence;
}

/**
 * Presence 팬아웃
 *
 * - 사용자가 속한 모든 길드 토픽 (세션당 한 번, guild_id 포함)
 * - friend 토픽 (친구들의 세션, guild_id 없음)
 * - IDENTIFY마다 세션 presence 발행 (기본 online)
 * - 연결된 세션이 하나도 남지 않으면 offline 발행, resume하면 다시 발행
 *
 * 현재 presence는 연결된 세션 기준이라 멤버 목록과 READY가 같은 값을 본다.
 */
export class PresenceService {
  /** 마지막으로 발행한 presence (offline 발행 전까지) */
  private readonly latest = new Map<Snowflake, PresenceRecord>();
  private readonly deps: PresenceServiceDeps;
  private readonly detachRegistry: () => void;

  constructor(deps: PresenceServiceDeps) {
    this.deps = deps;
    this.detachRegistry = deps.registry.on((event) => {
      switch (event.type) {
        case 'session_detached': {
          const session = deps.registry.get(event.sessionId);
          if (session) {
            this.checkConnections(session.userId);
          }
          return;
        }
        case 'session_unregistered':
          if (event.reason !== 'shutdown') {
            this.checkConnections(event.userId);
          }
          return;
        default:
          return;
      }
    });
  }

  /** IDENTIFY 직후: 세션 presence 발행 */
  announce(session: GatewaySession): DispatchResult {
    return this.update(session, session.presence);
  }

  /** resume 직후: offline으로 발행된 사용자면 다시 발행 */
  restore(session: GatewaySession): DispatchResult | undefined {
    if (this.latest.has(session.userId)) {
      return undefined;
    }
    return this.update(session, session.presence);
  }

  /** 세션의 presence 갱신 후 발행 */
  update(session: GatewaySession, presence: PresenceRecord): DispatchResult {
    session.presence = presence;
    this.latest.set(session.userId, presence);
    return this.publish(session.userId, presence);
  }

  /** 다른 사용자에게 보이는 현재 presence. 연결된 세션이 없거나 offline이면 undefined */
  current(userId: Snowflake): PresenceRecord | undefined {
    const attached = this.attachedSessions(userId);
    const first = attached[0];
    if (!first) {
      return undefined;
    }
    const visible = toVisible(this.latest.get(userId) ?? first.presence);
    return visible.status === 'offline' ? undefined : visible;
  }

  /** PRESENCE_UPDATE 팬아웃 (본인 세션 제외) */
  publish(userId: Snowflake, presence: PresenceRecord): DispatchResult {
    const { dispatcher, directory } = this.deps;
    const visible = toVisible(presence);
    const base: PresencePayload = {
      user: { id: userId },
      status: visible.status,
      activities: visible.activities,
      since: visible.since,
    };
    const notSelf = (session: GatewaySession): boolean => session.userId !== userId;

    const guildIds = directory.getUserGuildIds(userId);
    const byGuild = dispatcher.dispatchMany(
      'guild',
      guildIds,
      'PRESENCE_UPDATE',
      (guildId): PresencePayload => ({ ...base, guild_id: guildId }),
      { unique: true, filter: notSelf },
    );
    const byFriend = dispatcher.dispatch('friend', userId, 'PRESENCE_UPDATE', base, {
      filter: notSelf,
    });

    for (const guildId of guildIds) {
      this.deps.onGuildPresenceChange?.(guildId);
    }

    this.deps.logger.debug(`Presence ${visible.status} published for ${userId}`);
    return {
      delivered: [...byGuild.delivered, ...byFriend.delivered],
      buffered: [...byGuild.buffered, ...byFriend.buffered],
      skipped: [...byGuild.skipped, ...byFriend.skipped],
    };
  }

  /** 연결된 세션이 남지 않았으면 offline 발행 */
  private checkConnections(userId: Snowflake): void {
    if (this.attachedSessions(userId).length > 0 || !this.latest.has(userId)) {
      return;
    }
    this.latest.delete(userId);
    this.publish(userId, OFFLINE);
  }

  private attachedSessions(userId: Snowflake): GatewaySession[] {
    return this.deps.registry.sessionsForUser(userId).filter((session) => session.attached);
  }

  dispose(): void {
    this.detachRegistry();
    this.latest.clear();
  }
}
