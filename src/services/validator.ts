/**
 * Credential Validator
 * 驗證 POST /token 的請求內容
 */

import { z } from 'zod';
import { MalformedRequestError, MissingCredentialError } from '../lib/errors.js';
import type { ClientCredentials } from '../types/auth.js';

const credentialsSchema = z.object({
  client_id: z.string().nullish(),
  client_secret: z.string().nullish(),
});

/**
 * 解析原始請求內容
 * - 不是 JSON 物件，或欄位不是字串 → MalformedRequestError
 * - JSON null 視為空物件，null 欄位視為空字串
 * - client_id 或 client_secret 為空 → MissingCredentialError
 */
export function validateCredentials(raw: string | Buffer): ClientCredentials {
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new MalformedRequestError(undefined, { cause: error });
  }

  const result = credentialsSchema.safeParse(decoded ?? {});
  if (!result.success) {
    throw new MalformedRequestError(undefined, { cause: result.error });
  }

  const clientId = result.data.client_id ?? '';
  const clientSecret = result.data.client_secret ?? '';
  if (clientId === '' || clientSecret === '') {
    throw new MissingCredentialError();
  }

  return { clientId, clientSecret };
}
