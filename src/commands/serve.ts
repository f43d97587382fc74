/**
 * Serve Command
 * 啟動 token gateway（HTTP + NATS request/reply）
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { NatsTransport } from '../services/nats-transport.js';
import { startGateway } from '../server/bootstrap.js';
import { onShutdownSignal, parsePort, parsePositiveSeconds } from './options.js';

interface ServeOptions {
  config?: string;
  port?: number;
  requestTimeout?: number;
  cacheTtl?: number;
}

export const serveCommand = new Command('serve')
  .description('Start the token gateway HTTP server')
  .option('-c, --config <path>', 'Path to config file')
  .option('-p, --port <port>', 'HTTP server port', parsePort)
  .option('--request-timeout <seconds>', 'Timeout for token requests in seconds', parsePositiveSeconds)
  .option('--cache-ttl <seconds>', 'Token cache TTL in seconds', parsePositiveSeconds)
  .action(async (options: ServeOptions) => {
    try {
      const config = new ConfigService(options.config).getAll();

      if (options.port !== undefined) config.gateway.port = options.port;
      if (options.requestTimeout !== undefined) config.gateway.requestTimeoutMs = options.requestTimeout * 1000;
      if (options.cacheTtl !== undefined) config.gateway.cacheTtlMs = options.cacheTtl * 1000;

      const transport = await NatsTransport.connect(config.nats, 'Token Gateway');
      const running = await startGateway(config, transport);

      console.error(`✅ Token gateway listening on http://localhost:${running.port}`);
      onShutdownSignal(() => running.stop());
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to start gateway: ${errorMsg}`);
      process.exit(2);
    }
  });
