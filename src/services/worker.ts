/**
 * Token Worker
 * 在 queue group 中接收 token 請求，向 IDP 取得 token 後回覆
 */

import {
  CodecError,
  createErrorResponse,
  createTokenResponse,
  decodeTokenRequest,
  encode,
} from '../lib/codec.js';
import { loggers } from '../lib/logger.js';
import { recordWorkerRequest } from '../lib/metrics.js';
import type { TokenRequest } from '../types/token.js';
import type { TokenIssuer } from './idp.js';
import type { RequestReplyTransport, TransportSubscription } from './transport.js';

export interface TokenWorkerConfig {
  subject: string;
  queue: string;
  /** 傳給 IDP 的 scope */
  scope?: string;
}

export class TokenWorker {
  private subscription: TransportSubscription | null = null;

  constructor(
    private transport: RequestReplyTransport,
    private issueToken: TokenIssuer,
    private config: TokenWorkerConfig
  ) {}

  /**
   * 訂閱請求主題（queue group 內負載平衡）
   */
  start(): void {
    if (this.subscription) return;

    this.subscription = this.transport.subscribe(this.config.subject, (data) => this.handleRequest(data), {
      queue: this.config.queue,
    });

    loggers.worker.info('Subscribed to token requests', {
      url: this.config.subject,
      queue: this.config.queue,
    });
  }

  stop(): void {
    if (!this.subscription) return;

    this.subscription.unsubscribe();
    this.subscription = null;
    loggers.worker.info('Unsubscribed from token requests', { url: this.config.subject });
  }

  isRunning(): boolean {
    return this.subscription !== null;
  }

  /**
   * 處理一筆請求，回傳回覆內容（JSON）
   */
  async handleRequest(data: string): Promise<string> {
    let request: TokenRequest;
    try {
      request = decodeTokenRequest(data);
    } catch (error) {
      if (!(error instanceof CodecError)) throw error;
      loggers.worker.error('Failed to parse token request', error);
      recordWorkerRequest('invalid');
      return encode(createErrorResponse('', 'Invalid request format'));
    }

    const context = { requestId: request.request_id, clientId: request.client_id };
    loggers.worker.info('Received token request', context);

    try {
      const token = await loggers.worker.trackAsync(
        'IDP token exchange',
        () =>
          this.issueToken({
            clientId: request.client_id,
            clientSecret: request.client_secret,
            scope: this.config.scope,
          }),
        context
      );

      recordWorkerRequest('success');
      return encode(
        createTokenResponse(request.request_id, token.access_token, token.token_type, token.expires_in, token.scope)
      );
    } catch (error) {
      recordWorkerRequest('idp_error');
      const message = error instanceof Error ? error.message : String(error);
      return encode(createErrorResponse(request.request_id, message));
    }
  }
}
