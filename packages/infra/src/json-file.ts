// packages/infra/src/json-file.ts
import * as fs from 'node:fs';

/**
 * JSON 파일 동기 읽기 (프로세스 시작 시 사용)
 *
 * 파일이 없으면 undefined 반환. 값의 형태는 호출자가 검증한다.
 */
export function readJsonFileSync(filePath: string): unknown {
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
