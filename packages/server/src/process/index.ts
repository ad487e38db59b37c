// packages/server/src/process -- barrel export

// 시그널 핸들링
export { setupGracefulShutdown } from './signal-handler.js';

// 라이프사이클
export { ProcessLifecycle, type CleanupStep, type ProcessLifecycleDeps } from './lifecycle.js';
