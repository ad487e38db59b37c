// packages/server/src/gateway/server.ts
import { randomUUID } from 'node:crypto';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { PortInUseError, getEventBus, runWithContext } from '@parley/infra';
import {
  createGatewayRuntime,
  disposeGatewayRuntime,
  type GatewayRuntimeDeps,
  type GatewayServerContext,
} from './context.js';
import { handleHttpRequest } from './router.js';
import type { GatewayServerConfig } from './types.js';
import { handleWsConnection } from './ws/connection.js';

export interface GatewayServer {
  readonly ctx: GatewayServerContext;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** 종료 시 RECONNECT 전송 후 close 프레임이 나갈 시간 */
const SHUTDOWN_DRAIN_MS = 250;

export function createGatewayServer(
  config: GatewayServerConfig,
  deps: GatewayRuntimeDeps = {},
): GatewayServer {
  const runtime = createGatewayRuntime(config, deps);
  const httpServer = createServer();

  // WebSocket 서버
  const wss = new WebSocketServer({
    server: httpServer,
    maxPayload: config.ws.maxPayloadBytes,
  });

  // DI 컨테이너
  const ctx: GatewayServerContext = { ...runtime, httpServer, wss };

  // HTTP 요청 처리
  httpServer.on('request', (req: IncomingMessage, res: ServerResponse) => {
    void runWithContext({ requestId: randomUUID(), startedAt: Date.now() }, () =>
      handleHttpRequest(req, res, ctx),
    );
  });

  // WebSocket 연결 처리 (연결 수 제한)
  wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
    if (ctx.connections.size >= config.ws.maxConnections) {
      ws.close(1013, 'Too many connections');
      return;
    }
    handleWsConnection(ws, req, ctx);
  });

  return {
    ctx,

    async start(): Promise<void> {
      return new Promise((resolve, reject) => {
        // 포트 점유는 listen 실패로만 확인 (사전 검사와 바인딩 사이 경합 없음)
        const onError = (err: NodeJS.ErrnoException): void => {
          reject(err.code === 'EADDRINUSE' ? new PortInUseError(config.port, config.host) : err);
        };
        httpServer.once('error', onError);
        httpServer.listen(config.port, config.host, () => {
          httpServer.off('error', onError);
          const address = httpServer.address();
          const port = typeof address === 'object' && address ? address.port : config.port;
          ctx.logger.info(`Gateway listening on ${config.host}:${port}`);
          getEventBus().emit('gateway:start', port);
          resolve();
        });
      });
    },

    async stop(): Promise<void> {
      // 1. 모든 연결에 RECONNECT + 1001 (세션은 분리 상태로 남음)
      const live = [...ctx.connections.values()];
      for (const conn of live) {
        conn.shutdown();
      }

      // 2. close 프레임 drain 대기 -- 연결이 있을 때만
      if (live.length > 0) {
        await new Promise((resolve) => setTimeout(resolve, SHUTDOWN_DRAIN_MS));
      }
      for (const client of wss.clients) {
        client.terminate();
      }

      // 3. WebSocket/HTTP 서버 종료 후 런타임 정리
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      return new Promise((resolve) => {
        httpServer.close(() => {
          disposeGatewayRuntime(ctx);
          getEventBus().emit('gateway:stop');
          resolve();
        });
      });
    },
  };
}
