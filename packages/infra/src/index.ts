// @parley/infra -- barrel export

// 에러
export { ParleyError, PortInUseError, extractErrorInfo, type ErrorInfo } from './errors.js';

// 컨텍스트
export {
  runWithContext,
  getContext,
  bindSession,
  contextFields,
  type RequestContext,
} from './context.js';

// 환경/설정
export { loadDotenv } from './dotenv.js';
export { getEnv } from './env.js';
export { getStateDir, getConfigDir, getLogDir, getConfigFilePath } from './paths.js';
export { readJsonFileSync } from './json-file.js';

// 로깅
export {
  createLogger,
  type LoggerConfig,
  type ParleyLogger,
} from './logger.js';
export {
  attachFileTransport,
  RotatingFileSink,
  type FileTransportConfig,
} from './logger-transports.js';

// 이벤트
export {
  createTypedEmitter,
  getEventBus,
  resetEventBus,
  type EventMap,
  type TypedEmitter,
  type ParleyEventMap,
} from './events.js';

// 프로세스
export {
  setupUnhandledRejectionHandler,
  classifyError,
  type ErrorLevel,
} from './unhandled-rejections.js';
