/**
 * OAuth2 Token Response（IDP 回傳格式）
 */
export interface IdpTokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
  refresh_token?: string;
  scope?: string;
}

/**
 * Client credentials 組合
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  scope?: string;
}
