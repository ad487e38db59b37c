// packages/config/src/errors.ts
import { ParleyError } from '@parley/infra';

/** 설정 시스템 기본 에러 */
export class ConfigError extends ParleyError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'CONFIG_ERROR', opts);
    this.name = 'ConfigError';
  }
}

/** 필수 환경변수 누락 */
export class MissingEnvVarError extends ConfigError {
  readonly variable: string;
  /** 참조한 설정 경로 (예: auth.jwtSecret) */
  readonly configPath: string;
  constructor(variable: string, configPath: string) {
    super(`Environment variable not set: ${variable} (referenced by ${configPath || '<root>'})`, {
      details: { variable, configPath },
    });
    this.name = 'MissingEnvVarError';
    this.variable = variable;
    this.configPath = configPath;
  }
}

/** Zod 검증 실패 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = 'ConfigValidationError';
  }
}
