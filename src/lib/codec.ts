/**
 * Message Codec
 * TokenRequest / TokenResponse / Message 的 JSON 編解碼
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Message } from '../types/message.js';
import type { TokenRequest, TokenResponse } from '../types/token.js';

// 缺少或為 null 的欄位視為空字串
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const tokenRequestSchema = z.object({
  request_id: optionalString,
  client_id: optionalString,
  client_secret: optionalString,
  timestamp: z.string().nullish(),
});

const tokenResponseSchema = z.object({
  request_id: z.string().optional(),
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  timestamp: z.string().optional(),
});

const messageSchema = z.object({
  id: optionalString,
  subject: optionalString,
  body: optionalString,
  timestamp: optionalString,
  metadata: z.record(z.string()).nullish(),
});

export class CodecError extends Error {
  readonly code = 'CODEC_INVALID';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodecError';
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new CodecError('payload is not valid JSON', { cause: error });
  }
}

export function newRequestId(): string {
  return randomUUID();
}

export function createTokenRequest(clientId: string, clientSecret: string): TokenRequest {
  return {
    request_id: newRequestId(),
    client_id: clientId,
    client_secret: clientSecret,
    timestamp: new Date().toISOString(),
  };
}

export function createTokenResponse(
  requestId: string,
  accessToken: string,
  tokenType: string,
  expiresIn: number,
  scope?: string
): TokenResponse {
  return {
    request_id: requestId,
    access_token: accessToken,
    token_type: tokenType,
    expires_in: expiresIn,
    ...(scope ? { scope } : {}),
    timestamp: new Date().toISOString(),
  };
}

export function createErrorResponse(requestId: string, message: string): TokenResponse {
  return {
    request_id: requestId,
    access_token: '',
    token_type: '',
    expires_in: 0,
    error: message,
    timestamp: new Date().toISOString(),
  };
}

export function createMessage(subject: string, body: string, metadata: Record<string, string> = {}): Message {
  return {
    id: randomUUID(),
    subject,
    body,
    timestamp: new Date().toISOString(),
    metadata: { ...metadata },
  };
}

export function encode(message: TokenRequest | TokenResponse | Message): string {
  return JSON.stringify(message);
}

/**
 * 解碼 worker 收到的請求
 */
export function decodeTokenRequest(raw: string): TokenRequest {
  const result = tokenRequestSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new CodecError('payload is not a token request', { cause: result.error });
  }
  return {
    ...result.data,
    timestamp: result.data.timestamp ?? new Date().toISOString(),
  };
}

/**
 * 解碼 gateway 收到的回覆
 * 缺少的欄位補上零值；error 為空字串視同沒有錯誤
 */
export function decodeTokenResponse(raw: string): TokenResponse {
  const result = tokenResponseSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new CodecError('payload is not a token response', { cause: result.error });
  }

  const data = result.data;
  const response: TokenResponse = {
    request_id: data.request_id ?? '',
    access_token: data.access_token ?? '',
    token_type: data.token_type ?? '',
    expires_in: data.expires_in ?? 0,
    timestamp: data.timestamp ?? '',
  };
  if (data.scope) response.scope = data.scope;
  if (data.error) response.error = data.error;
  return response;
}

/**
 * 解碼 subscribe 收到的訊息；缺少的欄位補上零值
 */
export function decodeMessage(raw: string): Message {
  const result = messageSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new CodecError('payload is not a message', { cause: result.error });
  }
  return { ...result.data, metadata: result.data.metadata ?? {} };
}
