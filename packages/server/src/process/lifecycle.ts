// packages/server/src/process/lifecycle.ts
import type { CleanupFn } from '@parley/types';
import type { ParleyLogger } from '@parley/infra';
import { setupGracefulShutdown } from './signal-handler.js';

export interface ProcessLifecycleDeps {
  logger: ParleyLogger;
}

/** 이름 붙은 종료 단계 (로그에서 어느 단계가 실패했는지 구분) */
export interface CleanupStep {
  readonly name: string;
  readonly fn: CleanupFn;
}

/**
 * 프로세스 라이프사이클 관리자
 *
 * 게이트웨이 종료 순서는 등록 역순:
 *   gateway (RECONNECT + 1001, 런타임 정리) → logger (flush)
 * 시그널과 수동 shutdown()은 같은 종료 작업을 공유한다.
 */
export class ProcessLifecycle {
  private readonly steps: CleanupStep[] = [];
  private readonly logger: ParleyLogger;
  private initialized = false;
  private stopping: Promise<void> | null = null;

  constructor(deps: ProcessLifecycleDeps) {
    this.logger = deps.logger;
  }

  /** 종료 단계 등록 (역순으로 실행됨) */
  register(name: string, fn: CleanupFn): void {
    this.steps.push({ name, fn });
  }

  /** 시그널 핸들러 초기화 (한 번만 호출) */
  init(): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;
    setupGracefulShutdown(this.logger, () => this.shutdown());
    this.logger.info('Process lifecycle initialized');
  }

  /** 종료 단계를 역순 실행. 진행 중에 다시 부르면 같은 Promise */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.runSteps();
    }
    return this.stopping;
  }

  private async runSteps(): Promise<void> {
    for (const step of [...this.steps].reverse()) {
      const startedAt = Date.now();
      try {
        await step.fn();
        this.logger.debug(`Cleanup '${step.name}' done in ${Date.now() - startedAt}ms`);
      } catch (err) {
        // 한 단계 실패로 나머지 정리를 건너뛰지 않는다
        this.logger.error(`Cleanup '${step.name}' failed: ${String(err)}`);
      }
    }
  }
}
