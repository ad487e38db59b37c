// packages/server/src/process/signal-handler.ts
import { getEventBus, type ParleyLogger } from '@parley/infra';

/**
 * 우아한 종료 핸들러
 *
 * SIGINT/SIGTERM 수신 시:
 * 1. system:shutdown 발행
 * 2. shutdown() -- 종료 단계 실행, 30초 타임아웃
 *    -- 게이트웨이는 연결마다 RECONNECT 후 1001로 닫는다
 * 3. 프로세스 종료
 */
export function setupGracefulShutdown(
  logger: ParleyLogger,
  shutdown: () => Promise<void>,
): void {
  let shuttingDown = false;

  const handler = async (signal: string) => {
    if (shuttingDown) {
      logger.warn(`Forced exit on second ${signal}`);
      process.exit(1);
    }

    shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    getEventBus().emit('system:shutdown', signal);

    const timeout = setTimeout(() => {
      logger.error('Shutdown timeout (30s), forcing exit');
      process.exit(1);
    }, 30_000);

    try {
      await shutdown();
      logger.info('Graceful shutdown complete');
      clearTimeout(timeout);
      process.exit(0);
    } catch (err) {
      logger.error(`Shutdown error: ${String(err)}`);
      clearTimeout(timeout);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handler('SIGINT'));
  process.on('SIGTERM', () => void handler('SIGTERM'));
}
