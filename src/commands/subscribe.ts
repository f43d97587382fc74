/**
 * Subscribe Command
 * 訂閱主題並記錄收到的訊息
 */

import { Command } from 'commander';
import { ConfigService, DEFAULT_MESSAGE_SUBJECT } from '../services/config.js';
import { MessageSubscriber } from '../services/messages.js';
import { NatsTransport } from '../services/nats-transport.js';
import { onShutdownSignal } from './options.js';

interface SubscribeOptions {
  config?: string;
  subject: string;
  queue?: string;
}

export const subscribeCommand = new Command('subscribe')
  .description('Subscribe to a subject and log every message received')
  .option('-c, --config <path>', 'Path to config file')
  .option('-s, --subject <subject>', 'Subject to subscribe to', DEFAULT_MESSAGE_SUBJECT)
  .option('--queue <name>', 'Queue group name (optional)')
  .action(async (options: SubscribeOptions) => {
    try {
      const config = new ConfigService(options.config).getAll();
      const transport = await NatsTransport.connect(config.nats, 'Message Subscriber');

      const subscriber = new MessageSubscriber(transport, { subject: options.subject, queue: options.queue });
      subscriber.start();

      const group = options.queue ? ` in queue group ${options.queue}` : '';
      console.error(`✅ Subscribed to ${options.subject}${group}. Press Ctrl+C to exit.`);
      onShutdownSignal(async () => {
        subscriber.stop();
        await transport.close();
      });
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to start subscriber: ${errorMsg}`);
      process.exit(2);
    }
  });
