/**
 * Prometheus 指標收集
 * 追蹤 token 請求、快取、Bridge 與 worker 的各項指標
 */

import { register, Counter, Gauge, Histogram } from 'prom-client';
import type { TokenSource } from '../types/token.js';

/**
 * HTTP /token 指標
 */
export const tokenRequestsTotal = new Counter({
  name: 'gateway_token_requests_total',
  help: 'POST /token 請求總數',
  labelNames: ['source', 'status'] as const,
});

export const tokenRequestDurationSeconds = new Histogram({
  name: 'gateway_token_request_duration_seconds',
  help: 'POST /token 處理時間（秒）',
  labelNames: ['source'] as const,
  buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1.0, 2.0, 5.0, 10.0],
});

/**
 * 快取指標
 */
export const cacheHitsTotal = new Counter({
  name: 'gateway_cache_hits_total',
  help: '快取命中次數',
});

export const cacheMissesTotal = new Counter({
  name: 'gateway_cache_misses_total',
  help: '快取未命中次數',
});

export const cacheEntriesCount = new Gauge({
  name: 'gateway_cache_entries',
  help: '快取項目數量（含尚未清理的過期項目）',
});

export const cacheExpirationsTotal = new Counter({
  name: 'gateway_cache_expirations_total',
  help: '背景清理移除的過期項目數',
});

/**
 * Bridge 指標
 */
export type BridgeOutcome = 'success' | 'timeout' | 'unavailable' | 'serialization' | 'rejected';

export const bridgeRequestsTotal = new Counter({
  name: 'bridge_requests_total',
  help: '送往訊息層的 token 請求總數',
  labelNames: ['outcome'] as const,
});

export const bridgeRequestDurationSeconds = new Histogram({
  name: 'bridge_request_duration_seconds',
  help: '從送出請求到收到回覆（或逾時）的時間（秒）',
  labelNames: ['outcome'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1.0, 2.0, 5.0, 10.0],
});

/**
 * Worker 指標
 */
export const workerRequestsTotal = new Counter({
  name: 'worker_requests_total',
  help: 'Worker 處理的 token 請求總數',
  labelNames: ['outcome'] as const, // 'success' | 'invalid' | 'idp_error'
});

/**
 * 收集所有指標的 Prometheus 格式
 */
export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

/**
 * 取得指標內容類型
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}

export function recordTokenRequest(source: TokenSource | 'none', statusCode: number, durationMs: number): void {
  tokenRequestsTotal.inc({ source, status: String(statusCode) });
  tokenRequestDurationSeconds.observe({ source }, durationMs / 1000);
}

export function recordCacheHit(): void {
  cacheHitsTotal.inc();
}

export function recordCacheMiss(): void {
  cacheMissesTotal.inc();
}

export function updateCacheEntriesCount(count: number): void {
  cacheEntriesCount.set(count);
}

export function recordCacheExpirations(count: number): void {
  cacheExpirationsTotal.inc(count);
}

export function recordBridgeRequest(outcome: BridgeOutcome, durationMs: number): void {
  bridgeRequestsTotal.inc({ outcome });
  bridgeRequestDurationSeconds.observe({ outcome }, durationMs / 1000);
}

export function recordWorkerRequest(outcome: 'success' | 'invalid' | 'idp_error'): void {
  workerRequestsTotal.inc({ outcome });
}
