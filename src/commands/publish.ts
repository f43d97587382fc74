/**
 * Publish Command
 * 定時發布一般訊息到指定主題
 */

import { Command } from 'commander';
import { ConfigService, DEFAULT_MESSAGE_SUBJECT } from '../services/config.js';
import { MessagePublisher } from '../services/messages.js';
import { NatsTransport } from '../services/nats-transport.js';
import { onShutdownSignal, parsePositiveInt } from './options.js';

interface PublishOptions {
  config?: string;
  subject: string;
  interval: number;
}

export const publishCommand = new Command('publish')
  .description('Publish a numbered message to a subject at a fixed interval')
  .option('-c, --config <path>', 'Path to config file')
  .option('-s, --subject <subject>', 'Subject to publish to', DEFAULT_MESSAGE_SUBJECT)
  .option('-i, --interval <ms>', 'Publish interval in milliseconds', parsePositiveInt, 1000)
  .action(async (options: PublishOptions) => {
    try {
      const config = new ConfigService(options.config).getAll();
      const transport = await NatsTransport.connect(config.nats, 'Message Publisher');

      const publisher = new MessagePublisher(transport, {
        subject: options.subject,
        intervalMs: options.interval,
        metadata: { environment: config.environment },
      });
      publisher.start();

      console.error(`✅ Publishing to ${options.subject} every ${options.interval}ms. Press Ctrl+C to exit.`);
      onShutdownSignal(async () => {
        publisher.stop();
        await transport.close();
      });
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to start publisher: ${errorMsg}`);
      process.exit(2);
    }
  });
