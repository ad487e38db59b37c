// packages/server/src/main.ts
import {
  createLogger,
  getEventBus,
  loadDotenv,
  setupUnhandledRejectionHandler,
} from '@parley/infra';
import { loadConfig } from '@parley/config';
import { InMemoryDirectory } from './gateway/directory/memory.js';
import { loadDirectorySnapshot } from './gateway/directory/snapshot.js';
import { createGatewayServer } from './gateway/server.js';
import { ProcessLifecycle } from './process/index.js';
import { toGatewayServerConfig } from './server-config.js';

async function main(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  const logger = createLogger({
    name: 'parley',
    level: config.logging.level,
    file: { enabled: config.logging.file },
    ...(config.logging.redactSensitive ? {} : { redactKeys: [] }),
  });
  setupUnhandledRejectionHandler(logger);

  const lifecycle = new ProcessLifecycle({ logger });
  const serverConfig = toGatewayServerConfig(config);

  // 스토리지 계층이 내보낸 스냅샷으로 디렉터리 채우기
  const directory = config.directory.snapshotPath
    ? loadDirectorySnapshot(config.directory.snapshotPath)
    : new InMemoryDirectory();

  // 게이트웨이 서버 생성
  const gateway = createGatewayServer(serverConfig, { directory, logger });

  // 종료 단계 등록 (역순 실행: gateway → logger)
  lifecycle.register('logger', () => logger.flush());
  lifecycle.register('gateway', () => gateway.stop());

  // 시그널 핸들러 초기화
  lifecycle.init();

  // 서버 시작
  await gateway.start();

  // 시스템 준비 이벤트
  getEventBus().emit('system:ready');
}

main().catch((err: unknown) => {
  console.error('Failed to start gateway server:', err);
  process.exit(1);
});
