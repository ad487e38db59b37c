// packages/config/src/io.ts
import type { ResolvedConfig } from '@parley/types';
import JSON5 from 'json5';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ConfigDeps } from './types.js';
import { applyDefaults } from './defaults.js';
import { resolveEnvVars } from './env-substitution.js';
import { ConfigError } from './errors.js';
import { normalizePaths } from './normalize-paths.js';
import { resolveConfigPath } from './paths.js';
import { validateConfig, validateConfigStrict } from './validation.js';

/** ConfigIO -- 설정 읽기 파사드 */
export interface ConfigIO {
  /** 5단계 파이프라인으로 설정 로드 */
  loadConfig(): ResolvedConfig;
  /** 다음 loadConfig()가 파일을 다시 읽도록 한다 */
  invalidateCache(): void;
  /** 현재 설정 파일 경로 */
  readonly configPath: string;
}

/**
 * ConfigIO 팩토리
 *
 * 5단계 파이프라인:
 *   1. 파일 읽기 (JSON5)
 *   2. 환경변수 치환
 *   3. 경로 필드 정규화 (~/, 설정 파일 기준 상대 경로)
 *   4. Zod 검증 (실패 시 ConfigValidationError)
 *   5. 기본값 적용
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const json5Module = deps.json5 ?? JSON5;
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const configPath = deps.configPath ?? resolveConfigPath(env);
  const logger = deps.logger;
  // 게이트웨이는 기동 시 한 번 읽는다 -- 무효화 전까지 같은 객체
  let cached: ResolvedConfig | null = null;

  function readRaw(): unknown {
    try {
      const content = fsModule.readFileSync(configPath, 'utf-8');
      return json5Module.parse(content);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : new Error(String(err)),
      });
    }
  }

  function loadConfig(): ResolvedConfig {
    if (cached) {
      return cached;
    }

    // 1. 파일 읽기
    let raw = readRaw();

    // 2. 환경변수 치환
    raw = resolveEnvVars(raw, env);

    // 3. 경로 정규화
    raw = normalizePaths(raw, { homedir, baseDir: path.dirname(configPath) });

    // 4. Zod 검증
    const { valid, issues } = validateConfig(raw);
    if (!valid) {
      for (const issue of issues) {
        logger?.warn(`Config issue [${issue.path}]: ${issue.message}`);
      }
    }
    const userConfig = validateConfigStrict(raw);

    // 5. 기본값 적용
    const final = applyDefaults(userConfig);

    cached = final;
    return final;
  }

  return {
    loadConfig,
    invalidateCache: () => {
      cached = null;
    },
    get configPath() {
      return configPath;
    },
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

// ─── 모듈 레벨 래퍼 (편의) ───

let defaultIO: ConfigIO | null = null;
let defaultDeps: ConfigDeps | undefined;

/**
 * 기본 ConfigIO로 설정 로드 (싱글턴).
 * deps가 이전 호출과 다르면 내부 IO를 재생성한다.
 */
export function loadConfig(deps?: ConfigDeps): ResolvedConfig {
  if (!defaultIO || (deps && deps !== defaultDeps)) {
    defaultDeps = deps;
    defaultIO = createConfigIO(deps);
  }
  return defaultIO.loadConfig();
}

/** 기본 ConfigIO 캐시 초기화 */
export function clearConfigCache(): void {
  if (defaultIO) {
    defaultIO.invalidateCache();
  }
  defaultIO = null;
  defaultDeps = undefined;
}
