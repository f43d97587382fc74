import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { startGateway, startWorker } from '../../src/server/bootstrap.js';
import { defaultConfig } from '../../src/services/config.js';
import type { AppConfig } from '../../src/types/config.js';
import { MemoryTransport } from '../helpers/memory-transport.js';

function testConfig(): AppConfig {
  const config = defaultConfig();
  config.logLevel = 'error';
  config.gateway.port = 0;
  config.worker.idp.simulate = true;
  return config;
}

describe('bootstrap', () => {
  it('should serve tokens issued by a simulated worker', async () => {
    const transport = new MemoryTransport();
    const config = testConfig();
    const worker = startWorker(config, transport);
    const gateway = await startGateway(config, transport);

    try {
      expect(gateway.port).toBeGreaterThan(0);

      const response = await request(gateway.server)
        .post('/token')
        .send({ client_id: 'app', client_secret: 'test-secret' });

      expect(response.status).toBe(200);
      expect(response.body.access_token).toMatch(/^fake-token-app-\d+$/);
      expect(response.body.source).toBe('idp');
      expect(gateway.cache.get('app')).toBe(response.body.access_token);
    } finally {
      await gateway.stop();
      await worker.stop();
    }
  });

  it('should release every resource on stop', async () => {
    const transport = new MemoryTransport();
    const gateway = await startGateway(testConfig(), transport);

    await gateway.stop();
    await gateway.stop();

    expect(gateway.server.listening).toBe(false);
    expect(gateway.cache.isSweeping()).toBe(false);
    expect(gateway.bridge.isClosed()).toBe(true);
    expect(transport.isClosed()).toBe(true);
  });

  it('should subscribe the worker to the queue group', async () => {
    const transport = new MemoryTransport();
    const running = startWorker(testConfig(), transport);

    expect(transport.subscriberCount('token.request')).toBe(1);

    await running.stop();
    expect(running.worker.isRunning()).toBe(false);
  });
});
