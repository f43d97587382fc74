import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ofetch, FetchError } from 'ofetch';
import { IdpClient, createTokenIssuer } from '../../src/services/idp.js';
import { IdpError } from '../../src/lib/errors.js';

// Mock ofetch，保留真正的 FetchError
vi.mock('ofetch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ofetch')>()),
  ofetch: vi.fn(),
}));

const config = {
  baseUrl: 'https://idp.test',
  tokenPath: '/oauth/token',
  timeoutMs: 1000,
  scope: 'openid profile',
};

describe('IdpClient', () => {
  let client: IdpClient;

  beforeEach(() => {
    client = new IdpClient(config);
    vi.mocked(ofetch).mockReset();
  });

  describe('getTokenWithClientCredentials', () => {
    it('should post a client_credentials form to the token endpoint', async () => {
      const mockToken = { access_token: 'tok', token_type: 'Bearer', expires_in: 3600 };
      vi.mocked(ofetch).mockResolvedValueOnce(mockToken);

      const token = await client.getTokenWithClientCredentials({ clientId: 'app', clientSecret: 'test-secret' });

      expect(token).toEqual(mockToken);
      const [url, options] = vi.mocked(ofetch).mock.calls[0];
      expect(url).toBe('https://idp.test/oauth/token');
      expect(options).toMatchObject({
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'grant_type=client_credentials&client_id=app&client_secret=test-secret&scope=openid+profile',
        timeout: 1000,
        retry: 0,
      });
    });

    it('should prefer the scope passed with the credentials', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'tok', token_type: 'Bearer', expires_in: 60 });

      await client.getTokenWithClientCredentials({ clientId: 'app', clientSecret: 's', scope: 'email' });

      const [, options] = vi.mocked(ofetch).mock.calls[0];
      expect(options?.body).toBe('grant_type=client_credentials&client_id=app&client_secret=s&scope=email');
    });

    it('should report the status and body of an error response', async () => {
      const failure = Object.assign(new FetchError('401 Unauthorized'), {
        status: 401,
        data: { error: 'invalid_client' },
      });
      vi.mocked(ofetch).mockRejectedValueOnce(failure);

      const error = await client
        .getTokenWithClientCredentials({ clientId: 'app', clientSecret: 'wrong' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IdpError);
      expect(error).toHaveProperty('status', 401);
      expect(error).toHaveProperty('message', 'IDP returned error status: 401, body: {"error":"invalid_client"}');
    });

    it('should report network failures', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(
        client.getTokenWithClientCredentials({ clientId: 'app', clientSecret: 'test-secret' })
      ).rejects.toThrow('failed to send request: connect ECONNREFUSED');
    });
  });

  describe('simulateTokenRetrieval', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should issue a fake token after a short delay', async () => {
      const pending = client.simulateTokenRetrieval({ clientId: 'app', clientSecret: 'test-secret' });
      await vi.advanceTimersByTimeAsync(200);

      await expect(pending).resolves.toEqual({
        access_token: 'fake-token-app-1767225600',
        token_type: 'Bearer',
        expires_in: 3600,
        scope: 'openid profile',
      });
      expect(ofetch).not.toHaveBeenCalled();
    });
  });
});

describe('createTokenIssuer', () => {
  beforeEach(() => {
    vi.mocked(ofetch).mockReset();
  });

  it('should call the IDP when simulation is off', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'real', token_type: 'Bearer', expires_in: 60 });
    const issue = createTokenIssuer({ ...config, simulate: false });

    const token = await issue({ clientId: 'app', clientSecret: 'test-secret' });

    expect(token.access_token).toBe('real');
    expect(ofetch).toHaveBeenCalledOnce();
  });
});
