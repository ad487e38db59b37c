// packages/config/src/env-substitution.ts
import { MissingEnvVarError } from './errors.js';

/**
 * 환경변수 치환 -- auth.jwtSecret, auth.apiKeys 같은 비밀값을 파일 밖에 둔다
 *
 * - 대문자만: [A-Z_][A-Z0-9_]*
 * - 1회 치환 (치환 결과를 다시 해석하지 않음)
 * - $${VAR}: 리터럴 ${VAR}
 * - 미설정/빈 문자열: 참조 위치(auth.apiKeys.0 등)와 함께 MissingEnvVarError
 */

const REFERENCE = /\$(\$?)\{([A-Z_][A-Z0-9_]*)\}/g;

export function resolveEnvVars(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
  at: readonly (string | number)[] = [],
): unknown {
  if (typeof value === 'string') {
    return substituteString(value, env, at);
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => resolveEnvVars(item, env, [...at, i]));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveEnvVars(v, env, [...at, k]);
    }
    return result;
  }
  return value;
}

function substituteString(
  str: string,
  env: NodeJS.ProcessEnv,
  at: readonly (string | number)[],
): string {
  if (!str.includes('${')) {
    return str;
  }
  return str.replace(REFERENCE, (_, escaped: string, name: string) => {
    if (escaped) {
      return `\${${name}}`;
    }
    const value = env[name];
    if (value === undefined || value === '') {
      throw new MissingEnvVarError(name, at.join('.'));
    }
    return value;
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
