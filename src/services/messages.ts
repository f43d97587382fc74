/**
 * Message Publisher / Subscriber
 * 一般 NATS 訊息的定時發布與接收記錄（不經過 token 流程）
 */

import { CodecError, createMessage, decodeMessage, encode } from '../lib/codec.js';
import { loggers } from '../lib/logger.js';
import type { Message } from '../types/message.js';
import type { RequestReplyTransport, TransportSubscription } from './transport.js';

export interface PublisherConfig {
  subject: string;
  /** 發布間隔（毫秒） */
  intervalMs: number;
  /** 附加在每則訊息上的 metadata */
  metadata?: Record<string, string>;
}

export class MessagePublisher {
  private timer: NodeJS.Timeout | null = null;
  private count = 0;

  constructor(
    private transport: RequestReplyTransport,
    private config: PublisherConfig
  ) {}

  /**
   * 發布下一則 "Message #n"；失敗時記錄錯誤並回傳 null
   */
  publishNext(): Message | null {
    this.count++;
    const message = createMessage(this.config.subject, `Message #${this.count}`, {
      ...this.config.metadata,
      publisher: 'token-gateway',
      timestamp: new Date().toISOString(),
    });

    try {
      this.transport.publish(this.config.subject, encode(message));
    } catch (error) {
      loggers.pubsub.error(
        'Error publishing message',
        error instanceof Error ? error : new Error(String(error)),
        { url: this.config.subject, count: this.count }
      );
      return null;
    }

    loggers.pubsub.info('Published message', { id: message.id, url: this.config.subject, count: this.count });
    return message;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.publishNext(), this.config.intervalMs);
    loggers.pubsub.info('Publishing started', { url: this.config.subject, intervalMs: this.config.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    loggers.pubsub.info('Publishing stopped', { url: this.config.subject, published: this.count });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}

export interface SubscriberConfig {
  subject: string;
  /** 選用的 queue group */
  queue?: string;
}

export class MessageSubscriber {
  private subscription: TransportSubscription | null = null;
  private received = 0;

  constructor(
    private transport: RequestReplyTransport,
    private config: SubscriberConfig,
    private onMessage?: (message: Message) => void
  ) {}

  start(): void {
    if (this.subscription) return;

    this.subscription = this.transport.listen(this.config.subject, (data, subject) => this.handle(data, subject), {
      queue: this.config.queue,
    });
    loggers.pubsub.info('Subscribed to messages', { url: this.config.subject, queue: this.config.queue });
  }

  stop(): void {
    if (!this.subscription) return;

    this.subscription.unsubscribe();
    this.subscription = null;
  }

  isRunning(): boolean {
    return this.subscription !== null;
  }

  receivedCount(): number {
    return this.received;
  }

  private async handle(data: string, subject: string): Promise<void> {
    let message: Message;
    try {
      message = decodeMessage(data);
    } catch (error) {
      if (!(error instanceof CodecError)) throw error;
      loggers.pubsub.warn('Dropping malformed message', { url: subject, reason: error.message });
      return;
    }

    this.received++;
    loggers.pubsub.info('Received message', {
      url: subject,
      id: message.id,
      body: message.body,
      sentAt: message.timestamp,
      metadata: message.metadata,
    });
    this.onMessage?.(message);
  }
}
