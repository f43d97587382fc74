import { describe, it, expect } from 'vitest';
import { ErrorCode, NatsError } from 'nats';
import { buildConnectionOptions, mapNatsError } from '../../src/services/nats-transport.js';
import { NoRespondersError, TransportClosedError, TransportTimeoutError } from '../../src/services/transport.js';

describe('mapNatsError', () => {
  it('should map a NATS timeout', () => {
    const mapped = mapNatsError(new NatsError('TIMEOUT', ErrorCode.Timeout), 'token.request', 5000);

    expect(mapped).toBeInstanceOf(TransportTimeoutError);
    expect(mapped.message).toBe('Request on token.request timed out after 5000ms');
  });

  it('should map missing responders', () => {
    const mapped = mapNatsError(new NatsError('503', ErrorCode.NoResponders), 'token.request', 5000);

    expect(mapped).toBeInstanceOf(NoRespondersError);
  });

  it('should map a closed or draining connection', () => {
    expect(mapNatsError(new NatsError('closed', ErrorCode.ConnectionClosed), 's', 1)).toBeInstanceOf(
      TransportClosedError
    );
    expect(mapNatsError(new NatsError('draining', ErrorCode.ConnectionDraining), 's', 1)).toBeInstanceOf(
      TransportClosedError
    );
  });

  it('should pass other errors through', () => {
    const other = new NatsError('denied', ErrorCode.PermissionsViolation);
    expect(mapNatsError(other, 's', 1)).toBe(other);
    expect(mapNatsError('boom', 's', 1).message).toBe('boom');
  });
});

describe('buildConnectionOptions', () => {
  const base = {
    url: 'nats://localhost:4222',
    allowReconnect: true,
    maxReconnect: 10,
    reconnectWaitSeconds: 5,
  };

  it('should translate reconnect settings', () => {
    expect(buildConnectionOptions(base, 'Token Gateway')).toEqual({
      servers: 'nats://localhost:4222',
      name: 'Token Gateway',
      reconnect: true,
      maxReconnectAttempts: 10,
      reconnectTimeWait: 5000,
    });
  });

  it('should include only the credentials that are set', () => {
    const options = buildConnectionOptions({ ...base, username: 'gateway', password: 'test-secret' }, 'n');

    expect(options.user).toBe('gateway');
    expect(options.pass).toBe('test-secret');
    expect(options).not.toHaveProperty('token');
  });
});
