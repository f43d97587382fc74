/**
 * IDP Client
 * OAuth2 client-credentials 交換 - 由 worker 呼叫
 */

import { ofetch, FetchError } from 'ofetch';
import { IdpError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { ClientCredentials, IdpTokenResponse } from '../types/auth.js';
import type { IdpConfig } from '../types/config.js';

// 模擬模式的網路延遲
const SIMULATED_DELAY_MS = 200;

export type IdpClientConfig = Omit<IdpConfig, 'simulate'>;

export class IdpClient {
  private config: IdpClientConfig;

  constructor(config: IdpClientConfig) {
    this.config = config;
  }

  /**
   * 完整的 token 端點 URL
   */
  getTokenUrl(): string {
    return `${this.config.baseUrl}${this.config.tokenPath}`;
  }

  /**
   * 以 client credentials 向 IDP 取得 token
   */
  async getTokenWithClientCredentials(credentials: ClientCredentials): Promise<IdpTokenResponse> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
    });

    const scope = credentials.scope ?? this.config.scope;
    if (scope) {
      form.set('scope', scope);
    }

    try {
      return await ofetch<IdpTokenResponse>(this.getTokenUrl(), {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: form.toString(),
        timeout: this.config.timeoutMs,
        retry: 0,
      });
    } catch (error) {
      if (error instanceof FetchError && error.status !== undefined) {
        const body = typeof error.data === 'string' ? error.data : JSON.stringify(error.data ?? '');
        throw new IdpError(`IDP returned error status: ${error.status}, body: ${body}`, error.status, {
          cause: error,
        });
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new IdpError(`failed to send request: ${message}`, undefined, { cause: error });
    }
  }

  /**
   * 模擬取得 token（不需要真的 IDP）
   */
  async simulateTokenRetrieval(credentials: ClientCredentials): Promise<IdpTokenResponse> {
    await new Promise((resolve) => setTimeout(resolve, SIMULATED_DELAY_MS));

    const token: IdpTokenResponse = {
      access_token: `fake-token-${credentials.clientId}-${Math.floor(Date.now() / 1000)}`,
      token_type: 'Bearer',
      expires_in: 3600,
    };

    const scope = credentials.scope ?? this.config.scope;
    if (scope) {
      token.scope = scope;
    }

    loggers.idp.debug('Simulated token issued', { clientId: credentials.clientId });
    return token;
  }
}

/**
 * 取得 token 的函數型別（worker 依設定選擇真實或模擬）
 */
export type TokenIssuer = (credentials: ClientCredentials) => Promise<IdpTokenResponse>;

export function createTokenIssuer(config: IdpConfig): TokenIssuer {
  const client = new IdpClient(config);
  return config.simulate
    ? (credentials) => client.simulateTokenRetrieval(credentials)
    : (credentials) => client.getTokenWithClientCredentials(credentials);
}
