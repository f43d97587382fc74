/**
 * Worker Command
 * 啟動 token worker，在 queue group 中處理 token 請求
 */

import os from 'node:os';
import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { NatsTransport } from '../services/nats-transport.js';
import { startWorker } from '../server/bootstrap.js';
import { onShutdownSignal, workerClientName } from './options.js';

interface WorkerOptions {
  config?: string;
  idpUrl?: string;
  idpTokenPath?: string;
  queue?: string;
  nameSuffix?: string;
  simulate?: boolean;
}

export const workerCommand = new Command('worker')
  .description('Start a token worker that exchanges client credentials with the IDP')
  .option('-c, --config <path>', 'Path to config file')
  .option('--idp-url <url>', 'IDP base URL')
  .option('--idp-token-path <path>', 'IDP token endpoint path')
  .option('--queue <name>', 'Queue group name for load balancing')
  .option('--name-suffix <suffix>', 'Suffix appended to the client name (e.g. pod name)')
  .option('--simulate', 'Issue fake tokens instead of calling the IDP')
  .action(async (options: WorkerOptions) => {
    try {
      const config = new ConfigService(options.config).getAll();

      if (options.idpUrl) config.worker.idp.baseUrl = options.idpUrl;
      if (options.idpTokenPath) config.worker.idp.tokenPath = options.idpTokenPath;
      if (options.queue) config.worker.queue = options.queue;
      if (options.simulate) config.worker.idp.simulate = true;

      const name = workerClientName(options.nameSuffix, process.env, os.hostname());
      const transport = await NatsTransport.connect(config.nats, name);
      const running = startWorker(config, transport);

      console.error(`✅ ${name} running in queue group ${config.worker.queue}. Press Ctrl+C to exit.`);
      onShutdownSignal(() => running.stop());
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to start worker: ${errorMsg}`);
      process.exit(2);
    }
  });
