// packages/server/src/gateway/dispatcher.ts
import type { DispatchResult, Snowflake, TopicKind } from '@parley/types';
import { getEventBus, type ParleyLogger } from '@parley/infra';
import type { ChatDirectory } from './directory/types.js';
import { canViewChannel } from './permissions/lookup.js';
import { serializePayload } from './protocol/codec.js';
import type { SessionRegistry } from './registry.js';
import type { GatewaySession } from './session.js';

export interface DispatchOptions {
  /** 채널 단위 길드 이벤트 -- VIEW_CHANNEL 보유 사용자에게만 */
  readonly channelId?: Snowflake;
  /** 추가 수신자 조건 */
  readonly filter?: (session: GatewaySession) => boolean;
}

export interface DispatchManyOptions {
  /** 여러 키에 걸쳐 세션당 최대 한 번만 전달 */
  readonly unique?: boolean;
  readonly filter?: (session: GatewaySession) => boolean;
}

export interface EventDispatcherDeps {
  readonly registry: SessionRegistry;
  readonly directory: ChatDirectory;
  readonly logger: ParleyLogger;
}

/** 호출 단위 VIEW_CHANNEL 캐시 */
type ViewCheck = (userId: Snowflake, channelId: Snowflake) => boolean;

function emptyResult(): DispatchResult {
  return { delivered: [], buffered: [], skipped: [] };
}

/**
 * 이벤트 디스패처 -- (kind, key, event, payload) → 세션 fan-out
 *
 * | kind             | 수신자                                              |
 * |------------------|-----------------------------------------------------|
 * | guild            | 길드 토픽 구독자 (channelId 있으면 VIEW_CHANNEL 필터) |
 * | channel          | 길드 채널: 길드 구독자 ∩ VIEW_CHANNEL / DM: 채널 토픽 |
 * | user             | 해당 사용자의 모든 세션                               |
 * | friend           | key 사용자의 friend 토픽 구독자 (친구들의 세션)        |
 * | lazy-member-list | 멤버 목록을 구독한 세션                              |
 *
 * 페이로드는 키마다 한 번만 직렬화하고, seq는 세션이 전달 시점에 찍는다.
 * 한 세션의 전달 실패는 그 세션에 국한된다. 재시도하지 않는다.
 */
export class EventDispatcher {
  private readonly registry: SessionRegistry;
  private readonly directory: ChatDirectory;
  private readonly logger: ParleyLogger;

  constructor(deps: EventDispatcherDeps) {
    this.registry = deps.registry;
    this.directory = deps.directory;
    this.logger = deps.logger;
  }

  dispatch(
    kind: TopicKind,
    key: string,
    eventType: string,
    payload: unknown,
    opts: DispatchOptions = {},
  ): DispatchResult {
    const recipients = this.resolveRecipients(kind, key, opts.channelId, this.createViewCheck());
    const result = emptyResult();
    this.deliverAll(recipients, eventType, serializePayload(payload), opts.filter, result);
    this.report(kind, key, eventType, result);
    return result;
  }

  /** 여러 키에 같은 이벤트. payloadFn은 키마다 한 번 호출된다 */
  dispatchMany(
    kind: TopicKind,
    keys: readonly string[],
    eventType: string,
    payloadFn: (key: string) => unknown,
    opts: DispatchManyOptions = {},
  ): DispatchResult {
    const result = emptyResult();
    const seen = new Set<string>();
    const viewCheck = this.createViewCheck();

    for (const key of keys) {
      let recipients = this.resolveRecipients(kind, key, undefined, viewCheck);
      if (opts.unique) {
        recipients = recipients.filter((session) => !seen.has(session.id));
        for (const session of recipients) {
          seen.add(session.id);
        }
      }
      if (recipients.length === 0) {
        continue;
      }
      this.deliverAll(recipients, eventType, serializePayload(payloadFn(key)), opts.filter, result);
    }

    this.report(kind, keys.join(','), eventType, result);
    return result;
  }

  private resolveRecipients(
    kind: TopicKind,
    key: string,
    channelId: Snowflake | undefined,
    canView: ViewCheck,
  ): GatewaySession[] {
    switch (kind) {
      case 'guild': {
        const sessions = this.registry.sessionsFor({ kind: 'guild', key });
        return channelId === undefined
          ? sessions
          : sessions.filter((session) => canView(session.userId, channelId));
      }
      case 'channel': {
        const channel = this.directory.getChannel(key);
        if (!channel) {
          this.logger.warn(`Dispatch to unknown channel ${key}`);
          return [];
        }
        if (channel.guildId === undefined) {
          return this.registry.sessionsFor({ kind: 'channel', key });
        }
        return this.registry
          .sessionsFor({ kind: 'guild', key: channel.guildId })
          .filter((session) => canView(session.userId, channel.id));
      }
      case 'user':
        return this.registry.sessionsForUser(key);
      case 'friend':
        return this.registry.sessionsFor({ kind: 'friend', key });
      case 'lazy-member-list':
        return this.registry.sessionsFor({ kind: 'lazy-member-list', key });
      default: {
        const exhaustive: never = kind;
        throw new Error(`Unhandled topic kind: ${String(exhaustive)}`);
      }
    }
  }

  private deliverAll(
    recipients: readonly GatewaySession[],
    eventType: string,
    dataJson: string,
    filter: ((session: GatewaySession) => boolean) | undefined,
    result: DispatchResult,
  ): void {
    for (const session of recipients) {
      if (filter && !filter(session)) {
        continue;
      }
      try {
        const outcome = session.deliver(eventType, dataJson);
        switch (outcome) {
          case 'sent':
            result.delivered.push(session.id);
            break;
          case 'buffered':
            result.buffered.push(session.id);
            break;
          case 'saturated':
            result.skipped.push(session.id);
            break;
        }
      } catch (err) {
        result.skipped.push(session.id);
        this.logger.error(`Delivery to session ${session.id} failed: ${String(err)}`);
      }
    }
  }

  private createViewCheck(): ViewCheck {
    const cache = new Map<string, boolean>();
    return (userId, channelId) => {
      const cacheKey = `${userId}:${channelId}`;
      let allowed = cache.get(cacheKey);
      if (allowed === undefined) {
        allowed = canViewChannel(this.directory, userId, channelId);
        cache.set(cacheKey, allowed);
      }
      return allowed;
    };
  }

  private report(kind: TopicKind, key: string, eventType: string, result: DispatchResult): void {
    getEventBus().emit(
      'gateway:dispatch',
      kind,
      key,
      eventType,
      result.delivered.length + result.buffered.length,
      result.skipped.length,
    );
  }
}
