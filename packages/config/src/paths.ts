// packages/config/src/paths.ts
import { getConfigFilePath } from '@parley/infra';
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * 설정 파일 경로 해석 (JSON5)
 *
 * 우선순위:
 *   1. PARLEY_CONFIG 환경변수
 *   2. <stateDir>/config/parley.json5
 *   3. ./parley.json5
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.PARLEY_CONFIG;
  if (envPath) {
    return path.resolve(envPath);
  }

  const homePath = getConfigFilePath(env);
  if (fs.existsSync(homePath)) {
    return homePath;
  }

  return path.resolve('parley.json5');
}
