// packages/server/src/gateway/directory/errors.ts
import { ParleyError } from '@parley/infra';

/** 디렉터리 스냅샷 로드/검증 실패 */
export class DirectoryError extends ParleyError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'DIRECTORY_ERROR', { statusCode: 500, ...opts });
    this.name = 'DirectoryError';
  }
}
