import type { LogLevel } from '../lib/logger.js';

/**
 * NATS 連線設定
 */
export interface NatsConfig {
  url: string;
  username?: string;
  password?: string;
  token?: string;
  allowReconnect: boolean;
  maxReconnect: number;
  /** 重新連線間隔（秒） */
  reconnectWaitSeconds: number;
}

/**
 * Gateway（HTTP Front Door）設定
 */
export interface GatewayConfig {
  port: number;
  /** 等待 worker 回覆的上限（毫秒） */
  requestTimeoutMs: number;
  /** 快取 TTL（毫秒），需短於 token 實際效期 */
  cacheTtlMs: number;
  /** 背景清理間隔（毫秒） */
  sweepIntervalMs: number;
  /** token 請求主題 */
  subject: string;
}

/**
 * IDP 用戶端設定
 */
export interface IdpConfig {
  baseUrl: string;
  tokenPath: string;
  /** HTTP 逾時（毫秒） */
  timeoutMs: number;
  scope: string;
  /** 不呼叫 IDP，產生假 token（開發用） */
  simulate: boolean;
}

/**
 * Worker 設定
 */
export interface WorkerConfig {
  subject: string;
  queue: string;
  idp: IdpConfig;
}

/**
 * 設定檔結構
 */
export interface AppConfig {
  /** dev | test | prod */
  environment: string;
  logLevel: LogLevel;
  nats: NatsConfig;
  gateway: GatewayConfig;
  worker: WorkerConfig;
}
