// packages/infra/src/logger-transports.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogDir } from './paths.js';

export interface FileTransportConfig {
  enabled: boolean;
  /** 로그 디렉토리 (기본: <stateDir>/logs) */
  path?: string;
  /** 파일 이름 (기본: parley.log) */
  fileName?: string;
  maxSizeMb?: number; // 기본: 10
  maxFiles?: number; // 기본: 5
}

/**
 * 크기 기반 로테이션 파일 싱크
 *
 * parley.log가 maxBytes를 넘기면 parley.log.1 ... parley.log.(maxFiles-1)로 밀어낸다.
 */
export class RotatingFileSink {
  private stream: fs.WriteStream;
  private size: number;

  constructor(
    private readonly file: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    this.size = fs.existsSync(file) ? fs.statSync(file).size : 0;
    this.stream = open(file);
  }

  write(line: string): void {
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      this.rotate();
    }
    this.size += bytes;
    this.stream.write(line);
  }

  /** 현재 스트림을 닫고 기록 완료를 기다린다 */
  flush(): Promise<void> {
    const stream = this.stream;
    return new Promise((resolve) => {
      if (stream.writableFinished) {
        resolve();
      } else {
        stream.end(resolve);
      }
    });
  }

  private rotate(): void {
    this.stream.end();
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = i === 1 ? this.file : `${this.file}.${i - 1}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.file}.${i}`);
      }
    }
    this.stream = open(this.file);
    this.size = 0;
  }
}

/**
 * tslog에 JSON 라인 파일 트랜스포트 부착. flush 함수 반환
 */
export function attachFileTransport(
  logger: { attachTransport: (fn: (logObj: unknown) => void) => void },
  config: FileTransportConfig,
): (() => Promise<void>) | undefined {
  if (!config.enabled) {
    return undefined;
  }

  const file = path.join(config.path ?? getLogDir(), config.fileName ?? 'parley.log');
  const sink = new RotatingFileSink(
    file,
    (config.maxSizeMb ?? 10) * 1024 * 1024,
    config.maxFiles ?? 5,
  );

  logger.attachTransport((logObj: unknown) => {
    sink.write(JSON.stringify(logObj) + '\n');
  });
  return () => sink.flush();
}

function open(file: string): fs.WriteStream {
  return fs.createWriteStream(file, { flags: 'a', mode: 0o600 });
}
