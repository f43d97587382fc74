/**
 * Config Service
 * 設定管理服務 - 預設值、設定檔與環境變數
 *
 * 優先順序：命令列參數 > 環境變數 > 設定檔 > 預設值
 * （命令列參數由各指令自行套用）
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { LOG_LEVELS, isLogLevel } from '../lib/logger.js';
import type { AppConfig } from '../types/config.js';

export const DEFAULT_TOKEN_SUBJECT = 'token.request';
export const DEFAULT_QUEUE_GROUP = 'token-workers';
export const DEFAULT_MESSAGE_SUBJECT = 'messages';
export const DEFAULT_IDP_BASE_URL = 'https://idp.example.com';
export const DEFAULT_IDP_TOKEN_PATH = '/realms/phoenix/protocol/openid-connect/token';

/**
 * 預設設定
 * 快取 TTL 55 分鐘，比一般 60 分鐘的 token 早過期
 */
export function defaultConfig(): AppConfig {
  return {
    environment: 'dev',
    logLevel: 'info',
    nats: {
      url: 'nats://localhost:4222',
      allowReconnect: true,
      maxReconnect: 10,
      reconnectWaitSeconds: 5,
    },
    gateway: {
      port: 8080,
      requestTimeoutMs: 5 * 1000,
      cacheTtlMs: 55 * 60 * 1000,
      sweepIntervalMs: 60 * 1000,
      subject: DEFAULT_TOKEN_SUBJECT,
    },
    worker: {
      subject: DEFAULT_TOKEN_SUBJECT,
      queue: DEFAULT_QUEUE_GROUP,
      idp: {
        baseUrl: DEFAULT_IDP_BASE_URL,
        tokenPath: DEFAULT_IDP_TOKEN_PATH,
        timeoutMs: 10 * 1000,
        scope: 'openid profile',
        simulate: false,
      },
    },
  };
}

const positiveInt = z.number().int().positive();

const configFileSchema = z
  .object({
    environment: z.string(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    nats: z
      .object({
        url: z.string().min(1),
        username: z.string(),
        password: z.string(),
        token: z.string(),
        allowReconnect: z.boolean(),
        maxReconnect: z.number().int(),
        reconnectWaitSeconds: z.number().nonnegative(),
      })
      .partial(),
    gateway: z
      .object({
        port: positiveInt.max(65535),
        requestTimeoutMs: positiveInt,
        cacheTtlMs: positiveInt,
        sweepIntervalMs: positiveInt,
        subject: z.string().min(1),
      })
      .partial(),
    worker: z
      .object({
        subject: z.string().min(1),
        queue: z.string().min(1),
        idp: z
          .object({
            baseUrl: z.string().url(),
            tokenPath: z.string(),
            timeoutMs: positiveInt,
            scope: z.string(),
            simulate: z.boolean(),
          })
          .partial(),
      })
      .partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

function merge(base: AppConfig, file: ConfigFile): AppConfig {
  return {
    environment: file.environment ?? base.environment,
    logLevel: file.logLevel ?? base.logLevel,
    nats: { ...base.nats, ...file.nats },
    gateway: { ...base.gateway, ...file.gateway },
    worker: {
      subject: file.worker?.subject ?? base.worker.subject,
      queue: file.worker?.queue ?? base.worker.queue,
      idp: { ...base.worker.idp, ...file.worker?.idp },
    },
  };
}

export class ConfigService {
  private configPath?: string;
  private config: AppConfig;

  constructor(configPath?: string, private env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = this.applyEnvironmentOverrides(this.load());
  }

  /**
   * 載入設定檔；未指定路徑時使用預設值
   */
  private load(): AppConfig {
    const base = defaultConfig();
    if (!this.configPath) {
      return base;
    }

    let content: string;
    try {
      content = fs.readFileSync(this.configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`failed to read config file: ${this.configPath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`failed to parse config file: ${this.configPath}`, { cause: error });
    }

    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`invalid config file ${this.configPath}: ${issues.join('; ')}`);
    }

    return merge(base, result.data);
  }

  /**
   * 套用環境變數覆寫
   */
  private applyEnvironmentOverrides(config: AppConfig): AppConfig {
    const env = this.env;

    if (env.APP_ENV) {
      config.environment = env.APP_ENV;
    }

    if (env.APP_LOG_LEVEL) {
      if (!isLogLevel(env.APP_LOG_LEVEL)) {
        throw new ConfigError(`APP_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
      }
      config.logLevel = env.APP_LOG_LEVEL;
    }

    if (env.NATS_URL) config.nats.url = env.NATS_URL;
    if (env.NATS_USER) config.nats.username = env.NATS_USER;
    if (env.NATS_PASS) config.nats.password = env.NATS_PASS;
    if (env.NATS_TOKEN) config.nats.token = env.NATS_TOKEN;

    if (env.IDP_URL) config.worker.idp.baseUrl = env.IDP_URL;
    if (env.IDP_TOKEN_PATH) config.worker.idp.tokenPath = env.IDP_TOKEN_PATH;

    return config;
  }

  /**
   * 取得完整設定（複本）
   */
  getAll(): AppConfig {
    return structuredClone(this.config);
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return structuredClone(this.config[key]);
  }

  getConfigPath(): string | undefined {
    return this.configPath;
  }

  /**
   * 將設定寫入檔案（JSON，2 空格縮排）
   */
  save(targetPath: string): void {
    saveConfig(this.config, targetPath);
  }
}

export function saveConfig(config: AppConfig, targetPath: string): void {
  const dir = path.dirname(targetPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(targetPath, JSON.stringify(config, null, 2), 'utf-8');
}
