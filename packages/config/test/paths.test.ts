// packages/config/test/paths.test.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { resolveConfigPath } from '../src/paths.js';

describe('resolveConfigPath', () => {
  it('PARLEY_CONFIG 환경변수가 최우선이다', () => {
    expect(resolveConfigPath({ PARLEY_CONFIG: '/custom/config.json5' })).toBe(
      '/custom/config.json5',
    );
  });

  it('상태 디렉토리에 설정 파일이 있으면 그 경로를 반환한다', () => {
    const stateDir = fs.mkdtempSync(path.join(process.env.HOME ?? '/tmp', 'state-'));
    const configPath = path.join(stateDir, 'config', 'parley.json5');
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '{}');

    expect(resolveConfigPath({ PARLEY_STATE_DIR: stateDir })).toBe(configPath);
  });

  it('환경변수도 홈경로도 없으면 ./parley.json5를 반환한다', () => {
    // HOME이 tmpDir로 격리되어 있으므로 ./parley.json5
    expect(resolveConfigPath({})).toBe(path.resolve('parley.json5'));
  });
});
