// packages/infra/src/env.ts
const ENV_PREFIX = 'PARLEY_';

/**
 * PARLEY_<key> 환경 변수 조회
 *
 * 빈 문자열은 미설정으로 본다 (`PARLEY_STATE_DIR=` 로 기본값 복귀).
 */
export function getEnv(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[`${ENV_PREFIX}${key}`];
  return value === '' ? undefined : value;
}
