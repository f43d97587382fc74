import { describe, it, expect } from 'vitest';
import { filterMetrics } from '../../src/commands/metrics.js';

const BODY = [
  '# HELP gateway_cache_hits_total Cache hits',
  '# TYPE gateway_cache_hits_total counter',
  'gateway_cache_hits_total 3',
  '# HELP bridge_requests_total Bridge requests',
  '# TYPE bridge_requests_total counter',
  'bridge_requests_total{outcome="success"} 2',
].join('\n');

describe('filterMetrics', () => {
  it('should return the body unchanged without a prefix', () => {
    expect(filterMetrics(BODY)).toBe(BODY);
  });

  it('should keep only matching metrics with their HELP and TYPE lines', () => {
    expect(filterMetrics(BODY, 'bridge_')).toBe(
      [
        '# HELP bridge_requests_total Bridge requests',
        '# TYPE bridge_requests_total counter',
        'bridge_requests_total{outcome="success"} 2',
      ].join('\n')
    );
  });
});
