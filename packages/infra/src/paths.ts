// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/**
 * 상태 디렉토리 (설정/로그의 루트)
 *
 * PARLEY_STATE_DIR, 없으면 ~/.parley
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return getEnv('STATE_DIR', env) ?? path.join(os.homedir(), '.parley');
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getStateDir(env), 'config');
}

/** 파일 로그 기본 위치 (logging.file) */
export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getStateDir(env), 'logs');
}

/** 기본 설정 파일 경로 */
export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'parley.json5');
}
