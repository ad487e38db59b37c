import type { LogLevel } from '@parley/types';
// packages/infra/src/logger.ts
import { Logger as TsLogger } from 'tslog';
import { contextFields } from './context.js';
import { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  file?: FileTransportConfig;
  console?: {
    enabled: boolean;
    pretty?: boolean; // 기본: !isCI
  };
  redactKeys?: string[];
  autoInjectContext?: boolean; // 기본: true
}

export interface ParleyLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): ParleyLogger;
  flush(): Promise<void>;
}

const DEFAULT_REDACT_KEYS = [
  'token',
  'password',
  'secret',
  'jwtSecret',
  'apiKey',
  'apiKeys',
  'api_key',
  'authorization',
  'cookie',
];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): ParleyLogger {
  const isCI = process.env.CI === 'true';
  const consoleEnabled = config.console?.enabled ?? true;
  const tsLogger = new TsLogger({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: consoleEnabled ? ((config.console?.pretty ?? !isCI) ? 'pretty' : 'json') : 'hidden',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  const flushCallbacks: (() => Promise<void>)[] = [];

  // 파일 트랜스포트 부착
  if (config.file?.enabled) {
    const flush = attachFileTransport(tsLogger, config.file);
    if (flush) {
      flushCallbacks.push(flush);
    }
  }

  return wrapLogger(tsLogger, config.autoInjectContext ?? true, flushCallbacks);
}

/** tslog 인스턴스를 ParleyLogger로 래핑 */
function wrapLogger(
  tsLogger: TsLogger<unknown>,
  injectContext: boolean,
  flushCallbacks: (() => Promise<void>)[],
): ParleyLogger {
  const withCtx = (args: unknown[]): unknown[] => {
    if (!injectContext) {
      return args;
    }
    const fields = contextFields();
    if (!fields) {
      return args;
    }
    return [{ _ctx: fields }, ...args];
  };

  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...withCtx(args)),
    debug: (msg, ...args) => tsLogger.debug(msg, ...withCtx(args)),
    info: (msg, ...args) => tsLogger.info(msg, ...withCtx(args)),
    warn: (msg, ...args) => tsLogger.warn(msg, ...withCtx(args)),
    error: (msg, ...args) => tsLogger.error(msg, ...withCtx(args)),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...withCtx(args)),
    child: (name: string) => {
      // 서브 로거는 부모의 트랜스포트를 상속하므로 flush도 공유
      const childTsLogger = tsLogger.getSubLogger({ name });
      return wrapLogger(childTsLogger, injectContext, flushCallbacks);
    },
    flush: async () => {
      await Promise.all(flushCallbacks.map((fn) => fn()));
    },
  };
}
