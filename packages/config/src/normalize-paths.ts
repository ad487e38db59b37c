// packages/config/src/normalize-paths.ts
import * as os from 'node:os';
import * as path from 'node:path';

/** 파일 경로를 담는 설정 필드 (이외의 문자열은 건드리지 않는다) */
export const PATH_FIELDS: readonly (readonly string[])[] = [['directory', 'snapshotPath']];

export interface NormalizePathsOptions {
  homedir?: () => string;
  /** 상대 경로의 기준 -- 보통 설정 파일이 있는 디렉토리 */
  baseDir?: string;
}

/**
 * 경로 필드 정규화
 *
 * - ~, ~/ 접두사 → homedir()
 * - 상대 경로 → baseDir 기준 절대 경로 (baseDir가 없으면 그대로)
 * - 입력 객체는 바꾸지 않고 복사본을 반환
 */
export function normalizePaths(raw: unknown, opts: NormalizePathsOptions = {}): unknown {
  const homedir = opts.homedir ?? os.homedir;
  let result = raw;
  for (const field of PATH_FIELDS) {
    result = updateAt(result, field, (value) => normalizePath(value, homedir, opts.baseDir));
  }
  return result;
}

function normalizePath(value: string, homedir: () => string, baseDir?: string): string {
  if (value === '~') {
    return homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(homedir(), value.slice(2));
  }
  if (baseDir !== undefined && !path.isAbsolute(value)) {
    return path.resolve(baseDir, value);
  }
  return value;
}

/** keys 경로의 문자열 값만 fn으로 바꾼 복사본 */
function updateAt(
  value: unknown,
  keys: readonly string[],
  fn: (value: string) => string,
): unknown {
  const [head, ...rest] = keys;
  if (head === undefined) {
    return typeof value === 'string' ? fn(value) : value;
  }
  if (!isPlainObject(value) || !(head in value)) {
    return value;
  }
  return { ...value, [head]: updateAt(value[head], rest, fn) };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
