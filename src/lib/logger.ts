/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每行一筆，方便中央日誌系統解析
 * 特性：
 *   - 日誌級別控制（可由設定檔調整）
 *   - requestId / clientId 追蹤
 *   - 耗時監控 (duration)
 *   - 錯誤堆疊記錄
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** 請求唯一識別碼，對應 TokenRequest.request_id 或 HTTP x-request-id */
  requestId?: string;
  /** 用戶端識別碼（絕不記錄 client secret） */
  clientId?: string;
  /** HTTP 方法 */
  method?: string;
  /** 請求 URL 或訊息主題 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'info') */
  minLevel?: LogLevel;
  /** 是否輸出到控制台 (default: true) */
  console?: boolean;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆疊追蹤 (default: true) */
  includeStack?: boolean;
  /** 自定義輸出（測試用），設定後取代 console */
  sink?: (level: LogLevel, line: string) => void;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function errorCode(error: Error): string | undefined {
  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'string') return code;
    if (typeof code === 'number') return String(code);
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private minLevel: LogLevel;
  private useConsole: boolean;
  private formatter: (entry: LogEntry) => string;
  private includeStack: boolean;
  private sink?: (level: LogLevel, line: string) => void;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.minLevel = config.minLevel || 'info';
    this.useConsole = config.console !== false;
    this.formatter = config.formatter || ((entry: LogEntry) => JSON.stringify(entry));
    this.includeStack = config.includeStack !== false;
    this.sink = config.sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  /**
   * 輸出日誌
   */
  private output(entry: LogEntry): void {
    const formatted = this.formatter(entry);

    if (this.sink) {
      this.sink(entry.level, formatted);
      return;
    }

    if (!this.useConsole) return;

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
      default:
        console.log(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * 記錄 ERROR 級別日誌
   */
  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    });
  }

  /**
   * 設定日誌最小級別
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, {
        ...context,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          duration: Date.now() - startTime,
        }
      );
      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  gateway: new StructuredLogger('Gateway'),
  bridge: new StructuredLogger('Bridge'),
  cache: new StructuredLogger('Cache'),
  transport: new StructuredLogger('Transport'),
  worker: new StructuredLogger('Worker'),
  idp: new StructuredLogger('IDP'),
  pubsub: new StructuredLogger('PubSub'),
};

/**
 * 一次調整所有預設日誌記錄器的級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}
