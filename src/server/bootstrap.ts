/**
 * Gateway / Worker 組裝與生命週期
 */

import http from 'node:http';
import { loggers, setLogLevel } from '../lib/logger.js';
import { TokenBridge } from '../services/bridge.js';
import { createTokenCache, type TokenCache } from '../services/cache.js';
import { HealthCheckService } from '../services/health.js';
import { createTokenIssuer } from '../services/idp.js';
import { TokenGateway } from '../services/token-gateway.js';
import type { RequestReplyTransport } from '../services/transport.js';
import { TokenWorker } from '../services/worker.js';
import type { AppConfig } from '../types/config.js';
import { createApp } from './app.js';

export interface RunningGateway {
  server: http.Server;
  port: number;
  cache: TokenCache;
  bridge: TokenBridge;
  /** 停止接受連線、停止清理計時器、取消等待中的請求、關閉 transport */
  stop(): Promise<void>;
}

export interface RunningWorker {
  worker: TokenWorker;
  stop(): Promise<void>;
}

function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function listen(server: http.Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => reject(error);
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}

export async function startGateway(config: AppConfig, transport: RequestReplyTransport): Promise<RunningGateway> {
  setLogLevel(config.logLevel);
  const { gateway: settings } = config;

  const cache = createTokenCache({ sweepIntervalMs: settings.sweepIntervalMs });
  cache.start();
  loggers.gateway.info('Token cache initialized', { sweepIntervalMs: settings.sweepIntervalMs });

  const bridge = new TokenBridge(transport, {
    subject: settings.subject,
    defaultTimeoutMs: settings.requestTimeoutMs,
  });

  const gateway = new TokenGateway(cache, bridge, {
    cacheTtlMs: settings.cacheTtlMs,
    requestTimeoutMs: settings.requestTimeoutMs,
  });

  const app = createApp({
    gateway,
    health: new HealthCheckService({ transport, cache, bridge }),
  });

  const server = http.createServer(app);
  const port = await listen(server, settings.port);
  loggers.gateway.info('HTTP server listening', { port, environment: config.environment });

  let stopped = false;
  return {
    server,
    port,
    cache,
    bridge,
    async stop() {
      if (stopped) return;
      stopped = true;
      loggers.gateway.info('Shutting down gateway');
      const closing = closeServer(server);
      server.closeIdleConnections();
      cache.stop();
      bridge.close();
      await closing;
      await transport.close();
      loggers.gateway.info('Gateway stopped');
    },
  };
}

export function startWorker(config: AppConfig, transport: RequestReplyTransport): RunningWorker {
  setLogLevel(config.logLevel);
  const { worker: settings } = config;

  const worker = new TokenWorker(transport, createTokenIssuer(settings.idp), {
    subject: settings.subject,
    queue: settings.queue,
    scope: settings.idp.scope,
  });
  worker.start();

  loggers.worker.info('Token worker running', {
    queue: settings.queue,
    simulate: settings.idp.simulate,
  });

  let stopped = false;
  return {
    worker,
    async stop() {
      if (stopped) return;
      stopped = true;
      worker.stop();
      await transport.close();
      loggers.worker.info('Token worker stopped');
    },
  };
}
