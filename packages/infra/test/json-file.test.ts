import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { readJsonFileSync } from '../src/json-file.js';
import { withTempDir } from './helpers.js';

describe('readJsonFileSync', () => {
  it('JSON 파일을 파싱', async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, 'directory.json');
      await fs.writeFile(file, '{"users":[{"id":"1"}]}');
      expect(readJsonFileSync(file)).toEqual({ users: [{ id: '1' }] });
    });
  });

  it('파일이 없으면 undefined', async () => {
    await withTempDir(async (dir) => {
      expect(readJsonFileSync(path.join(dir, 'missing.json'))).toBeUndefined();
    });
  });

  it('잘못된 JSON은 SyntaxError', async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '{ users: ');
      expect(() => readJsonFileSync(file)).toThrow(SyntaxError);
    });
  });
});
