// packages/server/src/gateway/ws/heartbeat.ts

/**
 * 연결별 하트비트 감시
 *
 * HELLO와 함께 시작하고, HEARTBEAT를 받을 때마다 기한을 다시 잡는다.
 * 두 주기 안에 HEARTBEAT가 없으면 onTimeout 호출.
 */
export class HeartbeatMonitor {
  private timer: ReturnType<typeof setTimeout> | undefined;
  private lastBeatAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly onTimeout: () => void,
  ) {}

  start(): void {
    this.beat();
  }

  /** HEARTBEAT 수신 */
  beat(): void {
    this.stop();
    this.lastBeatAt = Date.now();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.onTimeout();
    }, this.intervalMs * 2);
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /** 마지막 HEARTBEAT (또는 시작) 시각 */
  get lastBeat(): number {
    return this.lastBeatAt;
  }
}
