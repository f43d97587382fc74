import { describe, it, expect, beforeEach } from 'vitest';
import { TokenBridge } from '../../src/services/bridge.js';
import {
  UpstreamRejectedError,
  UpstreamSerializationError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../../src/lib/errors.js';
import { createErrorResponse, createTokenResponse, decodeTokenRequest, encode } from '../../src/lib/codec.js';
import type { ReplyHandler } from '../../src/services/transport.js';
import { MemoryTransport, neverReply, replyWith } from '../helpers/memory-transport.js';

const SUBJECT = 'token.request';

/**
 * 回覆帶有正確 request_id 的 token
 */
const issuingWorker: ReplyHandler = async (data) => {
  const request = decodeTokenRequest(data);
  return encode(createTokenResponse(request.request_id, `tok-${request.client_id}`, 'Bearer', 3600));
};

describe('TokenBridge', () => {
  let transport: MemoryTransport;
  let bridge: TokenBridge;

  beforeEach(() => {
    transport = new MemoryTransport();
    bridge = new TokenBridge(transport, { subject: SUBJECT, defaultTimeoutMs: 1000 });
  });

  describe('successful exchange', () => {
    it('should return the worker reply', async () => {
      transport.subscribe(SUBJECT, issuingWorker);

      const response = await bridge.requestToken('app', 'test-secret');

      expect(response.access_token).toBe('tok-app');
      expect(response.token_type).toBe('Bearer');
      expect(response.expires_in).toBe(3600);
      expect(bridge.inFlightCount()).toBe(0);
    });

    it('should send exactly one request carrying the credentials', async () => {
      transport.subscribe(SUBJECT, issuingWorker);

      await bridge.requestToken('app', 'test-secret');

      expect(transport.sent).toHaveLength(1);
      expect(transport.sent[0].subject).toBe(SUBJECT);
      const sent = decodeTokenRequest(transport.sent[0].data);
      expect(sent.client_id).toBe('app');
      expect(sent.client_secret).toBe('test-secret');
    });

    it('should accept a reply with an empty request_id', async () => {
      transport.subscribe(SUBJECT, replyWith({ request_id: '', access_token: 'tok', token_type: 'Bearer' }));

      await expect(bridge.requestToken('app', 'test-secret')).resolves.toMatchObject({ access_token: 'tok' });
    });

    it('should deliver to one member of a queue group', async () => {
      let calls = 0;
      const counting: ReplyHandler = async (data, subject) => {
        calls++;
        return issuingWorker(data, subject);
      };
      transport.subscribe(SUBJECT, counting, { queue: 'token-workers' });
      transport.subscribe(SUBJECT, counting, { queue: 'token-workers' });

      await bridge.requestToken('app', 'test-secret');

      expect(calls).toBe(1);
    });
  });

  describe('rejected', () => {
    it('should surface the worker error message verbatim', async () => {
      transport.subscribe(SUBJECT, async (data) =>
        encode(createErrorResponse(decodeTokenRequest(data).request_id, 'invalid_client'))
      );

      const error = await bridge.requestToken('app', 'wrong').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamRejectedError);
      expect(error).toHaveProperty('message', 'invalid_client');
    });
  });

  describe('timeout', () => {
    it('should reject with a timeout when no reply arrives', async () => {
      transport.subscribe(SUBJECT, neverReply());

      await expect(bridge.requestToken('app', 'test-secret', 30)).rejects.toBeInstanceOf(UpstreamTimeoutError);
    });

    it('should release every pending slot after repeated timeouts', async () => {
      transport.subscribe(SUBJECT, neverReply());

      const results = await Promise.allSettled(
        Array.from({ length: 10 }, (_, i) => bridge.requestToken(`client-${i}`, 'test-secret', 20))
      );

      expect(results.every((r) => r.status === 'rejected')).toBe(true);
      expect(bridge.inFlightCount()).toBe(0);
      expect(transport.pendingCount()).toBe(0);
    });

    it('should use the default timeout when none is given', async () => {
      const fast = new TokenBridge(transport, { subject: SUBJECT, defaultTimeoutMs: 20 });
      transport.subscribe(SUBJECT, neverReply());

      const error = await fast.requestToken('app', 'test-secret').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamTimeoutError);
      expect(error).toHaveProperty('timeoutMs', 20);
    });
  });

  describe('transport failures', () => {
    it('should map no responders to unavailable', async () => {
      await expect(bridge.requestToken('app', 'test-secret')).rejects.toBeInstanceOf(UpstreamUnavailableError);
      expect(bridge.inFlightCount()).toBe(0);
    });

    it('should map a closed transport to unavailable', async () => {
      await transport.close();

      await expect(bridge.requestToken('app', 'test-secret')).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });

  describe('bad replies', () => {
    it('should treat non-JSON as a serialization error', async () => {
      transport.subscribe(SUBJECT, async () => 'not json');

      await expect(bridge.requestToken('app', 'test-secret')).rejects.toBeInstanceOf(UpstreamSerializationError);
    });

    it('should treat a reply for another request as a serialization error', async () => {
      transport.subscribe(SUBJECT, replyWith({ request_id: 'someone-else', access_token: 'tok' }));

      await expect(bridge.requestToken('app', 'test-secret')).rejects.toBeInstanceOf(UpstreamSerializationError);
    });

    it('should treat a reply without token or error as a serialization error', async () => {
      transport.subscribe(SUBJECT, replyWith({ token_type: 'Bearer' }));

      await expect(bridge.requestToken('app', 'test-secret')).rejects.toThrow(
        'token response has neither access_token nor error'
      );
    });
  });

  describe('close', () => {
    it('should reject pending requests and refuse new ones', async () => {
      transport.subscribe(SUBJECT, neverReply());

      const pending = bridge.requestToken('app', 'test-secret', 5000);
      bridge.close();

      await expect(pending).rejects.toThrow('bridge is closed');
      expect(bridge.inFlightCount()).toBe(0);
      expect(transport.pendingCount()).toBe(0);
      expect(bridge.isClosed()).toBe(true);

      await expect(bridge.requestToken('app', 'test-secret')).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });
});
