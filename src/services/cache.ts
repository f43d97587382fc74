/**
 * Cache Service
 * 記憶體快取服務 - 以 client ID 為 key 的 token 快取，含 TTL 與背景清理
 *
 * 所有操作都是事件迴圈上的同步區段，讀取不會看到寫到一半的項目，
 * 也不會在任何 I/O 期間持有快取。
 */

import { loggers } from '../lib/logger.js';
import { recordCacheExpirations, updateCacheEntriesCount } from '../lib/metrics.js';

export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000; // 1 分鐘

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface CacheOptions {
  /** 背景清理間隔（毫秒） */
  sweepIntervalMs?: number;
  /** 時鐘（測試用） */
  now?: () => number;
}

export interface CacheStatus {
  entries: number;
  sweeping: boolean;
  sweepIntervalMs: number;
}

export class ExpiringCache<V = string> {
  private items = new Map<string, CacheEntry<V>>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;

  constructor(options: CacheOptions = {}) {
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * 讀取未過期的值；過期或不存在時回傳 undefined（不刪除）
   */
  get(key: string): V | undefined {
    const entry = this.items.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      return undefined;
    }

    return entry.value;
  }

  /**
   * 新增或覆寫，expiresAt = now + ttl
   */
  set(key: string, value: V, ttlMs: number): void {
    this.items.set(key, { value, expiresAt: this.now() + ttlMs });
    updateCacheEntriesCount(this.items.size);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): boolean {
    const removed = this.items.delete(key);
    updateCacheEntriesCount(this.items.size);
    return removed;
  }

  clear(): void {
    this.items.clear();
    updateCacheEntriesCount(0);
  }

  /**
   * 目前儲存的項目數（包含已過期但尚未清理的）
   */
  size(): number {
    return this.items.size;
  }

  /**
   * 移除所有已過期項目，回傳移除數量
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.items) {
      if (now >= entry.expiresAt) {
        this.items.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      recordCacheExpirations(removed);
      loggers.cache.debug('Expired entries removed', { removed, remaining: this.items.size });
    }
    updateCacheEntriesCount(this.items.size);

    return removed;
  }

  /**
   * 啟動背景清理；重複呼叫不會建立第二個計時器
   */
  start(): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    // 不讓清理計時器阻止程序結束
    this.sweepTimer.unref();
  }

  stop(): void {
    if (!this.sweepTimer) return;

    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  isSweeping(): boolean {
    return this.sweepTimer !== null;
  }

  getStatus(): CacheStatus {
    return {
      entries: this.items.size,
      sweeping: this.isSweeping(),
      sweepIntervalMs: this.sweepIntervalMs,
    };
  }
}

/**
 * Token 快取：client ID → access token
 */
export type TokenCache = ExpiringCache<string>;

export function createTokenCache(options: CacheOptions = {}): TokenCache {
  return new ExpiringCache<string>(options);
}
