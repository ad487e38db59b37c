import type { ParleyLogger } from '@parley/infra';
// packages/config/src/types.ts

/**
 * ConfigDeps -- createConfigIO()에 주입하는 의존성 인터페이스 (sync)
 */
export interface ConfigDeps {
  fs?: Pick<typeof import('node:fs'), 'readFileSync'>;
  json5?: { parse(text: string): unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
  logger?: Pick<ParleyLogger, 'error' | 'warn' | 'info' | 'debug'>;
}
