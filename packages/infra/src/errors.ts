// packages/infra/src/errors.ts

/** 기본 에러 -- 모든 커스텀 에러의 상위 클래스 */
export class ParleyError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      statusCode?: number;
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'ParleyError';
    this.code = code;
    this.statusCode = opts.statusCode ?? 500;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

/** 게이트웨이 listen 포트 점유 */
export class PortInUseError extends ParleyError {
  constructor(port: number, host?: string) {
    super(`Port ${port} is already in use${host ? ` on ${host}` : ''}`, 'PORT_IN_USE', {
      statusCode: 503,
      details: { port, host },
    });
    this.name = 'PortInUseError';
  }
}

// ──────────────────────────────────────────────
// 도메인 에러 co-location 원칙:
//   ConfigError       → packages/config/src/errors.ts
//   GatewayCloseError → packages/server/src/gateway/errors.ts
//   DirectoryError    → packages/server/src/gateway/directory/errors.ts
// ──────────────────────────────────────────────

/** 로그용 구조화 에러 정보 */
export interface ErrorInfo {
  code: string;
  message: string;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  stack?: string;
  cause?: string;
}

/** 에러 객체에서 구조화된 정보 추출 */
export function extractErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof ParleyError) {
    return {
      code: err.code,
      message: err.message,
      isOperational: err.isOperational,
      ...(err.details && { details: err.details }),
      stack: err.stack,
      cause: causeMessage(err),
    };
  }
  if (err instanceof Error) {
    return { code: 'UNKNOWN', message: err.message, stack: err.stack, cause: causeMessage(err) };
  }
  return { code: 'UNKNOWN', message: String(err) };
}

function causeMessage(err: Error): string | undefined {
  return err.cause instanceof Error ? err.cause.message : undefined;
}
