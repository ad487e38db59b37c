import type { ParleyConfig, ConfigValidationIssue } from '@parley/types';
// packages/config/src/validation.ts
import { ConfigValidationError } from './errors.js';
import { ParleyConfigSchema } from './zod-schema.js';

export interface ValidationResult {
  valid: boolean;
  config: ParleyConfig;
  issues: ConfigValidationIssue[];
}

/**
 * Zod 기반 검증
 *
 * 1. safeParse로 스키마 검증
 * 2. 실패 시 issue 경로를 `a.b[0]` 형태로 평탄화, 빈 {} 반환
 * 3. 성공 시 validated config 반환
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = ParleyConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const issues = result.error.issues.map(
    (issue): ConfigValidationIssue => ({
      path: formatIssuePath(issue.path) || '(root)',
      message: issue.message,
      severity: 'error',
    }),
  );

  return { valid: false, config: {}, issues };
}

/**
 * 검증 실패 시 에러를 throw하는 strict 버전
 */
export function validateConfigStrict(raw: unknown): ParleyConfig {
  const { valid, config, issues } = validateConfig(raw);
  if (!valid) {
    throw new ConfigValidationError(
      `Config validation failed: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues },
    );
  }
  return config;
}

function formatIssuePath(segments: readonly PropertyKey[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      const key = String(segment);
      out += out ? `.${key}` : key;
    }
  }
  return out;
}
