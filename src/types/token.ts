/**
 * 訊息層 Token 請求（gateway → worker）
 */
export interface TokenRequest {
  request_id: string;
  client_id: string;
  client_secret: string;
  /** ISO 8601 */
  timestamp: string;
}

/**
 * 訊息層 Token 回覆（worker → gateway）
 * error 存在代表失敗；不存在代表成功且 access_token 有值
 */
export interface TokenResponse {
  request_id: string;
  access_token: string;
  token_type: string;
  expires_in: number;
  scope?: string;
  error?: string;
  /** ISO 8601 */
  timestamp: string;
}

export type TokenSource = 'cache' | 'idp';

/**
 * POST /token 成功回應
 */
export interface TokenPayload {
  access_token: string;
  token_type: string;
  source: TokenSource;
}
