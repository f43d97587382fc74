/**
 * Health Check Service - 系統健康狀態檢查
 * 檢查訊息層連線、快取與 Bridge 狀態
 */

import type { TokenBridge } from './bridge.js';
import type { TokenCache } from './cache.js';
import type { RequestReplyTransport } from './transport.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  details: string;
  lastChecked: string;
}

export interface HealthCheckResult {
  status: HealthStatus;
  timestamp: string;
  components: {
    messaging: ComponentHealth;
    cache: ComponentHealth;
    bridge: ComponentHealth;
  };
  summary: string;
}

export interface HealthDependencies {
  transport: RequestReplyTransport;
  cache: TokenCache;
  bridge: TokenBridge;
}

export class HealthCheckService {
  constructor(private deps: HealthDependencies) {}

  /**
   * 執行完整的健康檢查
   */
  performHealthCheck(): HealthCheckResult {
    const messaging = this.checkMessagingHealth();
    const cache = this.checkCacheHealth();
    const bridge = this.checkBridgeHealth();

    return {
      status: this.determineOverallStatus([messaging.status, cache.status, bridge.status]),
      timestamp: new Date().toISOString(),
      components: { messaging, cache, bridge },
      summary: this.generateSummary(messaging, cache, bridge),
    };
  }

  private checkMessagingHealth(): ComponentHealth {
    if (this.deps.transport.isClosed()) {
      return {
        status: 'unhealthy',
        details: 'Messaging connection closed',
        lastChecked: new Date().toISOString(),
      };
    }

    return {
      status: 'healthy',
      details: 'Messaging connection open',
      lastChecked: new Date().toISOString(),
    };
  }

  /**
   * 背景清理未啟動時視為降級（過期項目只會被動忽略）
   */
  private checkCacheHealth(): ComponentHealth {
    const status = this.deps.cache.getStatus();

    return {
      status: status.sweeping ? 'healthy' : 'degraded',
      details: status.sweeping
        ? `${status.entries} entries, sweeping every ${status.sweepIntervalMs}ms`
        : `${status.entries} entries, sweeper stopped`,
      lastChecked: new Date().toISOString(),
    };
  }

  private checkBridgeHealth(): ComponentHealth {
    const { bridge } = this.deps;

    if (bridge.isClosed()) {
      return {
        status: 'unhealthy',
        details: 'Bridge closed',
        lastChecked: new Date().toISOString(),
      };
    }

    return {
      status: 'healthy',
      details: `${bridge.inFlightCount()} requests in flight`,
      lastChecked: new Date().toISOString(),
    };
  }

  /**
   * 根據各組件狀態決定整體狀態
   */
  private determineOverallStatus(statuses: HealthStatus[]): HealthStatus {
    if (statuses.includes('unhealthy')) {
      return 'unhealthy';
    }
    if (statuses.includes('degraded')) {
      return 'degraded';
    }
    return 'healthy';
  }

  private generateSummary(messaging: ComponentHealth, cache: ComponentHealth, bridge: ComponentHealth): string {
    const issues: string[] = [];

    if (messaging.status === 'unhealthy') issues.push('messaging unavailable');
    if (bridge.status === 'unhealthy') issues.push('bridge closed');
    if (cache.status === 'degraded') issues.push('cache sweeper stopped');

    if (issues.length === 0) {
      return 'All components operational';
    }

    return `Issues detected: ${issues.join(', ')}`;
  }
}

/**
 * 根據健康檢查結果轉換為 HTTP 狀態碼
 */
export function getHttpStatusCode(status: HealthStatus): number {
  switch (status) {
    case 'healthy':
      return 200;
    case 'degraded':
      return 200; // 仍然返回 200，但在響應體中標記為降級
    case 'unhealthy':
      return 503;
  }
}
