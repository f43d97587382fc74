/**
 * Token Bridge
 * 把快取未命中轉成一次訊息層請求，並在期限內等待對應的回覆
 *
 * - 每次呼叫只送出一個請求，不重試
 * - 以 request_id 登記一次性的等待槽，回覆、失敗或逾時任一先到即結束
 * - 結束後一定釋放等待槽並中止 transport 請求
 * - 不寫入快取（由 Front Door 負責）
 */

import { createTokenRequest, decodeTokenResponse, encode, CodecError } from '../lib/codec.js';
import {
  GatewayError,
  UpstreamRejectedError,
  UpstreamSerializationError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordBridgeRequest, type BridgeOutcome } from '../lib/metrics.js';
import type { TokenRequest, TokenResponse } from '../types/token.js';
import { TransportTimeoutError, type RequestReplyTransport } from './transport.js';

export interface BridgeConfig {
  /** token 請求主題 */
  subject: string;
  /** 預設等待上限（毫秒） */
  defaultTimeoutMs: number;
}

interface PendingRequest {
  clientId: string;
  startedAt: number;
  reject: (error: GatewayError) => void;
}

function outcomeOf(error: GatewayError): BridgeOutcome {
  switch (error.code) {
    case 'UPSTREAM_TIMEOUT':
      return 'timeout';
    case 'UPSTREAM_REJECTED':
      return 'rejected';
    case 'UPSTREAM_SERIALIZATION':
      return 'serialization';
    default:
      return 'unavailable';
  }
}

export class TokenBridge {
  private pending = new Map<string, PendingRequest>();
  private closed = false;

  constructor(
    private transport: RequestReplyTransport,
    private config: BridgeConfig
  ) {}

  /**
   * 送出 token 請求並等待回覆
   * @throws UpstreamTimeoutError | UpstreamUnavailableError | UpstreamSerializationError | UpstreamRejectedError
   */
  async requestToken(clientId: string, clientSecret: string, timeoutMs?: number): Promise<TokenResponse> {
    const deadlineMs = timeoutMs ?? this.config.defaultTimeoutMs;
    const request = createTokenRequest(clientId, clientSecret);
    const requestId = request.request_id;
    const startedAt = Date.now();

    try {
      const response = await this.exchange(requestId, clientId, this.serialize(request), deadlineMs);
      recordBridgeRequest('success', Date.now() - startedAt);
      loggers.bridge.info('Token reply received', {
        requestId,
        clientId,
        duration: Date.now() - startedAt,
      });
      return response;
    } catch (error) {
      const gatewayError =
        error instanceof GatewayError
          ? error
          : new UpstreamUnavailableError('unexpected bridge failure', { cause: error });
      recordBridgeRequest(outcomeOf(gatewayError), Date.now() - startedAt);
      loggers.bridge.warn('Token request failed', {
        requestId,
        clientId,
        code: gatewayError.code,
        reason: gatewayError.message,
        duration: Date.now() - startedAt,
      });
      throw gatewayError;
    }
  }

  private exchange(requestId: string, clientId: string, payload: string, timeoutMs: number): Promise<TokenResponse> {
    if (this.closed) {
      return Promise.reject(new UpstreamUnavailableError('bridge is closed'));
    }

    return new Promise<TokenResponse>((resolve, reject) => {
      const controller = new AbortController();

      const settle = (): boolean => {
        if (!this.pending.has(requestId)) return false;
        this.pending.delete(requestId);
        clearTimeout(timer);
        controller.abort();
        return true;
      };

      const timer = setTimeout(() => {
        if (settle()) reject(new UpstreamTimeoutError(timeoutMs));
      }, timeoutMs);

      this.pending.set(requestId, {
        clientId,
        startedAt: Date.now(),
        reject: (error) => {
          if (settle()) reject(error);
        },
      });

      loggers.bridge.debug('Sending token request', { requestId, clientId, url: this.config.subject });

      let sent: Promise<string>;
      try {
        sent = this.transport.request(this.config.subject, payload, { timeoutMs, signal: controller.signal });
      } catch (error) {
        sent = Promise.reject(error);
      }

      sent.then(
        (reply) => {
          if (!settle()) return;
          try {
            resolve(this.interpret(requestId, reply));
          } catch (error) {
            reject(error);
          }
        },
        (error: unknown) => {
          if (!settle()) return;
          reject(this.mapTransportError(error, timeoutMs));
        }
      );
    });
  }

  private serialize(request: TokenRequest): string {
    try {
      return encode(request);
    } catch (error) {
      throw new UpstreamSerializationError('failed to serialize token request', { cause: error });
    }
  }

  /**
   * 解讀回覆內容
   */
  private interpret(requestId: string, raw: string): TokenResponse {
    let response: TokenResponse;
    try {
      response = decodeTokenResponse(raw);
    } catch (error) {
      if (error instanceof CodecError) {
        throw new UpstreamSerializationError(`failed to parse token response: ${error.message}`, { cause: error });
      }
      throw error;
    }

    if (response.request_id !== '' && response.request_id !== requestId) {
      throw new UpstreamSerializationError(
        `reply correlated to request ${response.request_id}, expected ${requestId}`
      );
    }

    if (response.error) {
      throw new UpstreamRejectedError(response.error);
    }

    if (response.access_token === '') {
      throw new UpstreamSerializationError('token response has neither access_token nor error');
    }

    return response;
  }

  private mapTransportError(error: unknown, timeoutMs: number): GatewayError {
    if (error instanceof TransportTimeoutError) {
      return new UpstreamTimeoutError(timeoutMs);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamUnavailableError(message, { cause: error });
  }

  /**
   * 等待中的請求數（逾時後必須歸零）
   */
  inFlightCount(): number {
    return this.pending.size;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * 拒絕所有等待中的請求，之後不再接受新請求
   */
  close(): void {
    this.closed = true;
    for (const [requestId, entry] of [...this.pending]) {
      loggers.bridge.warn('Cancelling pending token request', {
        requestId,
        clientId: entry.clientId,
        duration: Date.now() - entry.startedAt,
      });
      entry.reject(new UpstreamUnavailableError('bridge is closed'));
    }
  }
}
