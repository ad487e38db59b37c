// packages/server/src/gateway/errors.ts
import { GATEWAY_CLOSE_CODES, type GatewayCloseCode } from '@parley/types';
import { ParleyError } from '@parley/infra';

/** close code별 기본 사유 (WebSocket close reason은 123바이트 이하) */
export const CLOSE_REASONS: Readonly<Record<GatewayCloseCode, string>> = {
  [GATEWAY_CLOSE_CODES.NORMAL]: 'Normal closure',
  [GATEWAY_CLOSE_CODES.GOING_AWAY]: 'Going away',
  [GATEWAY_CLOSE_CODES.UNKNOWN_ERROR]: 'Unknown error',
  [GATEWAY_CLOSE_CODES.UNKNOWN_OPCODE]: 'Unknown opcode',
  [GATEWAY_CLOSE_CODES.DECODE_ERROR]: 'Decode error',
  [GATEWAY_CLOSE_CODES.NOT_AUTHENTICATED]: 'Not authenticated',
  [GATEWAY_CLOSE_CODES.AUTHENTICATION_FAILED]: 'Authentication failed',
  [GATEWAY_CLOSE_CODES.ALREADY_AUTHENTICATED]: 'Already authenticated',
  [GATEWAY_CLOSE_CODES.INVALID_SEQ]: 'Invalid seq',
  [GATEWAY_CLOSE_CODES.RATE_LIMITED]: 'Rate limited',
  [GATEWAY_CLOSE_CODES.SESSION_TIMED_OUT]: 'Session timed out',
  [GATEWAY_CLOSE_CODES.INVALID_SHARD]: 'Invalid shard',
  [GATEWAY_CLOSE_CODES.SHARDING_REQUIRED]: 'Sharding required',
  [GATEWAY_CLOSE_CODES.AUTHENTICATION_TIMEOUT]: 'Authentication timed out',
};

/** 세션을 분리(resume 가능) 상태로 남기는 서버측 close code */
const RESUMABLE_CLOSE_CODES: ReadonlySet<number> = new Set([
  GATEWAY_CLOSE_CODES.UNKNOWN_ERROR,
  GATEWAY_CLOSE_CODES.SESSION_TIMED_OUT,
  GATEWAY_CLOSE_CODES.GOING_AWAY,
]);

export function isResumableCloseCode(code: number): boolean {
  return RESUMABLE_CLOSE_CODES.has(code);
}

/**
 * 연결을 닫아야 하는 프로토콜/인증 에러.
 * 연결 상태 머신이 잡아서 closeCode로 연결을 닫는다.
 */
export class GatewayCloseError extends ParleyError {
  readonly closeCode: GatewayCloseCode;
  readonly resumable: boolean;

  constructor(
    closeCode: GatewayCloseCode,
    message?: string,
    opts: { cause?: Error; details?: Record<string, unknown> } = {},
  ) {
    super(message ?? CLOSE_REASONS[closeCode], 'GATEWAY_CLOSE', {
      statusCode: 400,
      cause: opts.cause,
      details: { closeCode, ...opts.details },
    });
    this.name = 'GatewayCloseError';
    this.closeCode = closeCode;
    this.resumable = isResumableCloseCode(closeCode);
  }
}

export function isGatewayCloseError(err: unknown): err is GatewayCloseError {
  return err instanceof GatewayCloseError;
}
