// packages/server/src/gateway/replay-buffer.ts

/** 버퍼에 보관된 DISPATCH 하나 */
export interface ReplayedEvent {
  readonly seq: number;
  readonly eventType: string;
  /** 직렬화된 d */
  readonly data: string;
  /** 인코딩된 전체 프레임 */
  readonly frame: string;
}

/**
 * 세션별 재생 버퍼 (고정 크기 링 버퍼, 가장 오래된 것부터 버림)
 *
 * 순서 번호가 붙은 DISPATCH 프레임을 연속된 꼬리 구간으로 보관한다.
 * 요청한 seq 이후의 프레임이 하나라도 빠졌으면 부분 재생 대신 null.
 */
export class ReplayBuffer {
  private readonly entries: Array<ReplayedEvent | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.entries = new Array<ReplayedEvent | undefined>(capacity);
  }

  push(event: ReplayedEvent): void {
    if (this.capacity === 0) {
      return;
    }
    const tail = (this.head + this.count) % this.capacity;
    this.entries[tail] = event;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /**
   * seq 이후 이벤트를 순서대로 반환
   *
   * @param seq 클라이언트가 마지막으로 받은 seq
   * @param latestSeq 세션이 마지막으로 발급한 seq
   * @returns 빠진 구간이 있으면 null
   */
  after(seq: number, latestSeq: number): ReplayedEvent[] | null {
    if (seq >= latestSeq) {
      return [];
    }
    const oldest = this.oldestSeq;
    if (oldest === undefined || oldest > seq + 1) {
      return null;
    }
    const events: ReplayedEvent[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.entries[(this.head + i) % this.capacity];
      if (entry && entry.seq > seq) {
        events.push(entry);
      }
    }
    return events;
  }

  /** 보관 중인 가장 오래된 seq */
  get oldestSeq(): number | undefined {
    return this.count === 0 ? undefined : this.entries[this.head]?.seq;
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.entries.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
