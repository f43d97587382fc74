/**
 * Token Gateway (Front Door)
 * Validate → CacheLookup → Bridge → CachePopulate → Respond
 *
 * 請求之間不保留狀態；內部錯誤對應 HTTP 狀態碼只在這裡發生。
 */

import { isGatewayError, type GatewayError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { recordCacheHit, recordCacheMiss, recordTokenRequest } from '../lib/metrics.js';
import type { TokenPayload, TokenSource } from '../types/token.js';
import type { TokenBridge } from './bridge.js';
import type { TokenCache } from './cache.js';
import { validateCredentials } from './validator.js';

export const DEFAULT_TOKEN_TYPE = 'Bearer';

export const TIMEOUT_MESSAGE = 'Request timed out';
export const INTERNAL_ERROR_MESSAGE = 'Failed to process request';

export type GatewayResponse =
  | { status: 200; body: TokenPayload }
  | { status: 400; body: { error: string } }
  | { status: 500 | 504; text: string };

export interface TokenGatewayOptions {
  /** 快取 TTL（毫秒） */
  cacheTtlMs: number;
  /** 等待 worker 回覆的上限（毫秒） */
  requestTimeoutMs: number;
}

export interface IssueOptions {
  /** 略過快取讀取與寫入 */
  skipCache?: boolean;
  /** 用於日誌追蹤的 HTTP 請求 ID */
  requestId?: string;
}

/**
 * skip_cache=1 或 skip_cache=true；重複的參數只看第一個
 */
export function isSkipCache(value: unknown): boolean {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return first === '1' || first === 'true';
}

/**
 * 內部錯誤 → HTTP 回應
 */
export function toErrorResponse(error: GatewayError): GatewayResponse {
  switch (error.code) {
    case 'MALFORMED_REQUEST':
    case 'MISSING_CREDENTIAL':
    case 'UPSTREAM_REJECTED':
      return { status: 400, body: { error: error.message } };
    case 'UPSTREAM_TIMEOUT':
      return { status: 504, text: TIMEOUT_MESSAGE };
    case 'UPSTREAM_UNAVAILABLE':
    case 'UPSTREAM_SERIALIZATION':
      return { status: 500, text: INTERNAL_ERROR_MESSAGE };
  }
}

export class TokenGateway {
  constructor(
    private cache: TokenCache,
    private bridge: TokenBridge,
    private options: TokenGatewayOptions
  ) {}

  /**
   * 處理一筆 POST /token
   */
  async issueToken(rawBody: string | Buffer, options: IssueOptions = {}): Promise<GatewayResponse> {
    const startTime = Date.now();
    const { skipCache = false, requestId } = options;
    let source: TokenSource | 'none' = 'none';

    const finish = (response: GatewayResponse): GatewayResponse => {
      recordTokenRequest(source, response.status, Date.now() - startTime);
      return response;
    };

    try {
      // 1️⃣ 驗證
      const { clientId, clientSecret } = validateCredentials(rawBody);

      // 2️⃣ 查快取
      if (!skipCache) {
        const cached = this.cache.get(clientId);
        if (cached !== undefined) {
          recordCacheHit();
          source = 'cache';
          loggers.gateway.info('Serving cached token', { requestId, clientId });
          return finish({
            status: 200,
            body: { access_token: cached, token_type: DEFAULT_TOKEN_TYPE, source },
          });
        }
        recordCacheMiss();
      }

      // 3️⃣ 透過訊息層向 worker 取得
      loggers.gateway.info('Requesting token from workers', { requestId, clientId, skipCache });
      const response = await this.bridge.requestToken(clientId, clientSecret, this.options.requestTimeoutMs);

      // 4️⃣ 寫入快取
      if (!skipCache) {
        this.cache.set(clientId, response.access_token, this.options.cacheTtlMs);
        loggers.gateway.info('Token cached', { requestId, clientId, ttlMs: this.options.cacheTtlMs });
      }

      // 5️⃣ 回應
      source = 'idp';
      return finish({
        status: 200,
        body: {
          access_token: response.access_token,
          token_type: response.token_type || DEFAULT_TOKEN_TYPE,
          source,
        },
      });
    } catch (error) {
      if (isGatewayError(error)) {
        return finish(toErrorResponse(error));
      }
      throw error;
    }
  }
}
