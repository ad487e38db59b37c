// packages/server/src/gateway/protocol/index.ts
export {
  decodeFrame,
  encodeDispatch,
  encodeFrame,
  serializePayload,
  truncateCloseReason,
  type InboundFrame,
} from './codec.js';
export {
  ActivitySchema,
  FrameEnvelopeSchema,
  HeartbeatSchema,
  IdentifySchema,
  LazyRequestSchema,
  PresenceSchema,
  RequestGuildMembersSchema,
  ResumeSchema,
} from './schemas.js';
