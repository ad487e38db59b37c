// packages/infra/src/unhandled-rejections.ts
import { ParleyError } from './errors.js';
import { getEventBus } from './events.js';

/**
 * 처리되지 않은 rejection 분류 후 대응
 *
 * L1: AbortError → warn
 * L2: Fatal (OOM, 스택 초과) → exit
 * L3: Config (CONFIG_ERROR, PORT_IN_USE) → exit -- 재시작해도 같은 결과
 * L4: Operational ParleyError (GatewayCloseError, DirectoryError 등) → warn
 *     -- 연결 하나의 실패가 게이트웨이 전체를 내리지 않는다
 * L5: Transient (소켓 errno) → warn
 * L6: 기타, isOperational=false ParleyError → exit
 */
export function setupUnhandledRejectionHandler(logger: {
  warn: (msg: string) => void;
  error: (msg: string) => void;
}): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const level = classifyError(reason);
    getEventBus().emit('system:unhandledRejection', level, reason);

    switch (level) {
      case 'abort':
      case 'operational':
      case 'transient':
        logger.warn(`Unhandled rejection (${level}): ${formatReason(reason)}`);
        break;
      default:
        logger.error(`Fatal unhandled rejection (${level}): ${formatReason(reason)}`);
        process.exit(1);
    }
  });
}

export type ErrorLevel = 'abort' | 'fatal' | 'config' | 'operational' | 'transient' | 'unknown';

/** 시작/설정 단계 에러 코드 */
const CONFIG_CODES: ReadonlySet<string> = new Set(['CONFIG_ERROR', 'PORT_IN_USE']);

/** 클라이언트 소켓이 끊길 때 나는 errno */
const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

/** 에러 분류 (테스트에서도 사용) */
export function classifyError(err: unknown): ErrorLevel {
  if (isAbortError(err)) {
    return 'abort';
  }
  if (isFatalError(err)) {
    return 'fatal';
  }
  if (err instanceof ParleyError) {
    if (CONFIG_CODES.has(err.code)) {
      return 'config';
    }
    return err.isOperational ? 'operational' : 'unknown';
  }
  const code = errnoCode(err);
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return 'transient';
  }
  return 'unknown';
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function isFatalError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  if (err instanceof RangeError && err.message.includes('call stack')) {
    return true;
  }
  const msg = err.message.toLowerCase();
  return msg.includes('out of memory') || errnoCode(err) === 'ERR_WORKER_OUT_OF_MEMORY';
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function formatReason(reason: unknown): string {
  if (reason instanceof ParleyError) {
    return `${reason.name} [${reason.code}]: ${reason.message}`;
  }
  if (reason instanceof Error) {
    return `${reason.name}: ${reason.message}`;
  }
  return String(reason);
}
