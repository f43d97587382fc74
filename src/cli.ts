import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { workerCommand } from './commands/worker.js';
import { healthCommand } from './commands/health.js';
import { metricsCommand } from './commands/metrics.js';
import { configCommand } from './commands/config.js';
import { publishCommand } from './commands/publish.js';
import { subscribeCommand } from './commands/subscribe.js';

export const cli = new Command();

cli
  .name('token-gateway')
  .description('Token cache gateway bridging HTTP clients to IDP workers over NATS')
  .version('0.1.0');

// 註冊指令
cli.addCommand(serveCommand);
cli.addCommand(workerCommand);
cli.addCommand(healthCommand);
cli.addCommand(metricsCommand);
cli.addCommand(configCommand);
cli.addCommand(publishCommand);
cli.addCommand(subscribeCommand);
