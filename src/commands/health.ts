/**
 * Health Check Command
 * 健康檢查指令 - 查詢執行中 gateway 的 /health/status
 */

import { Command } from 'commander';
import { ofetch } from 'ofetch';
import type { ComponentHealth, HealthCheckResult } from '../services/health.js';

export const DEFAULT_GATEWAY_URL = 'http://localhost:8080';

interface HealthOptions {
  url: string;
  text?: boolean;
}

export const healthCommand = new Command('health')
  .description('Check the health of a running token gateway')
  .option('-u, --url <url>', 'Gateway base URL', DEFAULT_GATEWAY_URL)
  .option('--text', 'Print a readable summary instead of JSON')
  .action(async (options: HealthOptions) => {
    try {
      const response = await ofetch.raw<HealthCheckResult>(`${options.url}/health/status`, {
        ignoreResponseError: true,
        retry: 0,
      });
      const result = response._data;

      if (!result) {
        console.error(`❌ Empty health response (HTTP ${response.status})`);
        process.exit(2);
      }

      if (options.text) {
        console.log(formatHealthText(result));
      } else {
        console.log(JSON.stringify(result, null, 2));
      }

      process.exit(response.status === 503 ? 2 : 0);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Health check failed: ${errorMsg}`);
      process.exit(2);
    }
  });

/**
 * 將狀態文字轉換為帶 emoji 的格式
 */
function statusEmoji(status: string): string {
  switch (status) {
    case 'healthy':
      return '✅';
    case 'degraded':
      return '⚠️';
    case 'unhealthy':
      return '❌';
    default:
      return '❓';
  }
}

export function formatHealthText(result: HealthCheckResult): string {
  const components: Array<[string, ComponentHealth]> = Object.entries(result.components);
  const lines = [`${statusEmoji(result.status)} ${result.status} (${result.timestamp})`];

  for (const [name, health] of components) {
    lines.push(`  ${statusEmoji(health.status)} ${name}: ${health.details}`);
  }

  lines.push(result.summary);
  return lines.join('\n');
}
