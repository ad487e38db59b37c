// packages/server/src/gateway/context.ts
import type { Server as HttpServer } from 'node:http';
import type { WebSocketServer } from 'ws';
import { createLogger, type ParleyLogger } from '@parley/infra';
import { InMemoryDirectory } from './directory/memory.js';
import { EventDispatcher } from './dispatcher.js';
import { MemberListService } from './member-list.js';
import { MembershipCoordinator } from './membership.js';
import { PresenceService } from './presence.js';
import { RateLimiter, type MonotonicClock } from './rate-limit/limiter.js';
import { SessionRegistry } from './registry.js';
import type { GatewayServerConfig } from './types.js';
import type { GatewayConnection } from './ws/connection.js';

/**
 * 게이트웨이 런타임 -- 연결 상태 머신이 필요로 하는 공유 상태.
 * 모듈 전역 Map/Registry를 두지 않고 테스트 격리를 보장한다.
 */
export interface GatewayRuntime {
  readonly config: GatewayServerConfig;
  readonly logger: ParleyLogger;
  readonly directory: InMemoryDirectory;
  readonly registry: SessionRegistry;
  readonly dispatcher: EventDispatcher;
  readonly rateLimiter: RateLimiter;
  readonly presence: PresenceService;
  readonly memberList: MemberListService;
  readonly membership: MembershipCoordinator;
  readonly connections: Map<string, GatewayConnection>;
}

/** HTTP/WebSocket 서버까지 포함한 DI 컨테이너 */
export interface GatewayServerContext extends GatewayRuntime {
  readonly httpServer: HttpServer;
  readonly wss: WebSocketServer;
}

export interface GatewayRuntimeDeps {
  readonly directory?: InMemoryDirectory;
  readonly logger?: ParleyLogger;
  /** 속도 제한용 단조 시계 (테스트 주입) */
  readonly clock?: MonotonicClock;
}

/** 컴포넌트를 의존 순서대로 조립 */
export function createGatewayRuntime(
  config: GatewayServerConfig,
  deps: GatewayRuntimeDeps = {},
): GatewayRuntime {
  const logger = deps.logger ?? createLogger({ name: 'gateway' });
  const directory = deps.directory ?? new InMemoryDirectory();
  const registry = new SessionRegistry({
    resumeTtlMs: config.sessions.resumeTtlMs,
    logger: logger.child('registry'),
  });
  const dispatcher = new EventDispatcher({
    registry,
    directory,
    logger: logger.child('dispatcher'),
  });
  const presence = new PresenceService({
    registry,
    directory,
    dispatcher,
    logger: logger.child('presence'),
    onGuildPresenceChange: (guildId) => {
      memberList.notifyChanged(guildId);
    },
  });
  const memberList = new MemberListService({
    registry,
    directory,
    dispatcher,
    presence,
    logger: logger.child('member-list'),
  });
  const membership = new MembershipCoordinator({
    directory,
    registry,
    dispatcher,
    memberList,
    logger: logger.child('membership'),
  });

  return {
    config,
    logger,
    directory,
    registry,
    dispatcher,
    rateLimiter: new RateLimiter({ classes: config.rateLimits, clock: deps.clock }),
    presence,
    memberList,
    membership,
    connections: new Map(),
  };
}

/** 타이머/구독 해제 */
export function disposeGatewayRuntime(rt: GatewayRuntime): void {
  rt.presence.dispose();
  rt.registry.dispose();
  rt.rateLimiter.dispose();
  rt.connections.clear();
}
