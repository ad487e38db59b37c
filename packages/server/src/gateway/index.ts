// packages/server/src/gateway/index.ts

// 서버
export { createGatewayServer, type GatewayServer } from './server.js';

// DI 컨테이너
export {
  createGatewayRuntime,
  disposeGatewayRuntime,
  type GatewayRuntime,
  type GatewayRuntimeDeps,
  type GatewayServerContext,
} from './context.js';

// 타입
export type { GatewayServerConfig, AuthLevel, AuthInfo, AuthResult } from './types.js';

// 에러
export {
  GatewayCloseError,
  isGatewayCloseError,
  isResumableCloseCode,
  CLOSE_REASONS,
} from './errors.js';

// 핵심 컴포넌트
export { GatewaySession, generateSessionId, type FrameTransport, type DeliveryOutcome } from './session.js';
export { ReplayBuffer } from './replay-buffer.js';
export {
  SessionRegistry,
  topicKey,
  type RegistryEvent,
  type UnregisterReason,
} from './registry.js';
export { EventDispatcher, type DispatchOptions, type DispatchManyOptions } from './dispatcher.js';
export {
  RateLimiter,
  UnknownActionClassError,
  type ActionClass,
  type RateLimitDecision,
  type MonotonicClock,
} from './rate-limit/limiter.js';
export { GatewayConnection, handleWsConnection, type ConnectionState } from './ws/connection.js';
export { HeartbeatMonitor } from './ws/heartbeat.js';

// 도메인 서비스
export { MembershipCoordinator, type MemberRemovalReason } from './membership.js';
export { PresenceService } from './presence.js';
export { MemberListService } from './member-list.js';
export { buildReadyPayload, buildGuildPayload, GATEWAY_VERSION } from './ready.js';
export { shardOf, ownsGuild, parseShard, guildsForShard } from './sharding.js';

// 권한 / 디렉터리 / 프로토콜
export * from './permissions/index.js';
export * from './directory/index.js';
export * from './protocol/index.js';

// 인증
export { authenticate, validateApiKey, validateToken } from './auth/index.js';
