import os from 'node:os';
import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // 게이트웨이 서버 테스트가 실제 포트(0번 할당)와 타이머를 쓰므로 프로세스 격리
    pool: 'forks',
    maxWorkers: isCI ? 2 : Math.max(2, Math.min(8, os.cpus().length)),
    hookTimeout: 30_000,
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    setupFiles: ['test/setup.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/server/src/main.ts', 'packages/*/src/index.ts'],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 60,
      },
    },
  },
});
