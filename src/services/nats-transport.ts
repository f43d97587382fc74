/**
 * NATS Transport
 * 以 NATS 實作 RequestReplyTransport
 */

import {
  connect,
  ErrorCode,
  NatsError,
  StringCodec,
  type ConnectionOptions,
  type Msg,
  type NatsConnection,
} from 'nats';
import { loggers } from '../lib/logger.js';
import type { NatsConfig } from '../types/config.js';
import {
  NoRespondersError,
  RequestAbortedError,
  TransportClosedError,
  TransportTimeoutError,
  type MessageHandler,
  type ReplyHandler,
  type RequestOptions,
  type RequestReplyTransport,
  type TransportSubscription,
} from './transport.js';

const codec = StringCodec();

/**
 * 將 NATS 錯誤轉成 transport 錯誤
 */
export function mapNatsError(error: unknown, subject: string, timeoutMs: number): Error {
  if (error instanceof NatsError) {
    switch (error.code) {
      case ErrorCode.Timeout:
        return new TransportTimeoutError(subject, timeoutMs);
      case ErrorCode.NoResponders:
        return new NoRespondersError(subject);
      case ErrorCode.ConnectionClosed:
      case ErrorCode.ConnectionDraining:
        return new TransportClosedError(error.message);
    }
    return error;
  }
  return error instanceof Error ? error : new Error(String(error));
}

export function buildConnectionOptions(config: NatsConfig, name: string): ConnectionOptions {
  const options: ConnectionOptions = {
    servers: config.url,
    name,
    reconnect: config.allowReconnect,
    maxReconnectAttempts: config.maxReconnect,
    reconnectTimeWait: config.reconnectWaitSeconds * 1000,
  };

  if (config.username) options.user = config.username;
  if (config.password) options.pass = config.password;
  if (config.token) options.token = config.token;

  return options;
}

export class NatsTransport implements RequestReplyTransport {
  private constructor(private readonly nc: NatsConnection) {}

  /**
   * 建立連線並開始記錄連線狀態變化
   */
  static async connect(config: NatsConfig, name: string): Promise<NatsTransport> {
    loggers.transport.info('Connecting to NATS', { url: config.url, name });

    const nc = await connect(buildConnectionOptions(config, name));
    const transport = new NatsTransport(nc);
    transport.watchStatus().catch((error: unknown) => {
      loggers.transport.error(
        'NATS status watcher stopped',
        error instanceof Error ? error : new Error(String(error))
      );
    });

    loggers.transport.info('Connected to NATS', { url: nc.getServer() });
    return transport;
  }

  private async watchStatus(): Promise<void> {
    for await (const status of this.nc.status()) {
      loggers.transport.warn('NATS connection status changed', {
        type: String(status.type),
        data: String(status.data),
      });
    }
  }

  request(subject: string, data: string, options: RequestOptions): Promise<string> {
    const { timeoutMs, signal } = options;

    if (this.nc.isClosed()) {
      return Promise.reject(new TransportClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(new RequestAbortedError(subject));
    }

    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        // NATS 會在相同的 timeout 到期時釋放自己的 mux 項目
        reject(new RequestAbortedError(subject));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.nc.request(subject, codec.encode(data), { timeout: timeoutMs }).then(
        (msg: Msg) => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) return;
          settled = true;
          resolve(codec.decode(msg.data));
        },
        (error: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          const mapped = mapNatsError(error, subject, timeoutMs);
          if (settled) {
            loggers.transport.debug('Late request failure after abort', { url: subject, reason: mapped.message });
            return;
          }
          settled = true;
          reject(mapped);
        }
      );
    });
  }

  subscribe(subject: string, handler: ReplyHandler, options: { queue?: string } = {}): TransportSubscription {
    const sub = this.nc.subscribe(subject, {
      queue: options.queue,
      callback: (error, msg) => {
        if (error) {
          loggers.transport.error('Subscription error', error, { url: subject });
          return;
        }
        void this.dispatch(handler, msg);
      },
    });

    return {
      subject,
      queue: options.queue,
      unsubscribe: () => sub.unsubscribe(),
    };
  }

  publish(subject: string, data: string): void {
    try {
      this.nc.publish(subject, codec.encode(data));
    } catch (error) {
      throw mapNatsError(error, subject, 0);
    }
  }

  listen(subject: string, handler: MessageHandler, options: { queue?: string } = {}): TransportSubscription {
    const sub = this.nc.subscribe(subject, {
      queue: options.queue,
      callback: (error, msg) => {
        if (error) {
          loggers.transport.error('Subscription error', error, { url: subject });
          return;
        }
        handler(codec.decode(msg.data), msg.subject).catch((handlerError: unknown) => {
          loggers.transport.error(
            'Message handler failed',
            handlerError instanceof Error ? handlerError : new Error(String(handlerError)),
            { url: msg.subject }
          );
        });
      },
    });

    return {
      subject,
      queue: options.queue,
      unsubscribe: () => sub.unsubscribe(),
    };
  }

  private async dispatch(handler: ReplyHandler, msg: Msg): Promise<void> {
    try {
      const reply = await handler(codec.decode(msg.data), msg.subject);
      if (!msg.respond(codec.encode(reply))) {
        loggers.transport.warn('Message has no reply subject', { url: msg.subject });
      }
    } catch (error) {
      loggers.transport.error(
        'Reply handler failed',
        error instanceof Error ? error : new Error(String(error)),
        { url: msg.subject }
      );
    }
  }

  isClosed(): boolean {
    return this.nc.isClosed();
  }

  /**
   * 排空訂閱後關閉連線
   */
  async close(): Promise<void> {
    if (this.nc.isClosed()) return;
    await this.nc.drain();
  }
}
