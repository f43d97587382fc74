/**
 * Gateway Errors
 * 錯誤分類 - 用戶端輸入錯誤與上游（訊息/IDP）錯誤
 *
 * 只有 Front Door 會把這些錯誤對應成 HTTP 狀態碼；
 * Bridge 只會拋出 Upstream* 四種錯誤。
 */

export type GatewayErrorCode =
  | 'MALFORMED_REQUEST'
  | 'MISSING_CREDENTIAL'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_SERIALIZATION'
  | 'UPSTREAM_REJECTED';

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 請求內容無法解析為 {client_id, client_secret} */
export class MalformedRequestError extends GatewayError {
  readonly code = 'MALFORMED_REQUEST';

  constructor(message = 'Invalid request format', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** client_id 或 client_secret 為空 */
export class MissingCredentialError extends GatewayError {
  readonly code = 'MISSING_CREDENTIAL';

  constructor(message = 'Client ID and Client Secret are required') {
    super(message);
  }
}

/** 在期限內沒有收到對應的回覆 */
export class UpstreamTimeoutError extends GatewayError {
  readonly code = 'UPSTREAM_TIMEOUT';
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No reply within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** 傳輸層失敗（沒有 worker、連線關閉等） */
export class UpstreamUnavailableError extends GatewayError {
  readonly code = 'UPSTREAM_UNAVAILABLE';
}

/** 請求無法序列化，或回覆不是合法的 TokenResponse */
export class UpstreamSerializationError extends GatewayError {
  readonly code = 'UPSTREAM_SERIALIZATION';
}

/** Worker / IDP 明確拒絕，message 原樣保留 */
export class UpstreamRejectedError extends GatewayError {
  readonly code = 'UPSTREAM_REJECTED';
}

/** 設定檔內容不合法 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** IDP 回傳非 2xx 或無法連線 */
export class IdpError extends Error {
  readonly code = 'IDP_FAILED';
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IdpError';
    this.status = status;
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
