/**
 * Metrics Command
 * 指標檢視指令 - 取得執行中 gateway 的 Prometheus 指標
 */

import { Command } from 'commander';
import { ofetch } from 'ofetch';
import { DEFAULT_GATEWAY_URL } from './health.js';

interface MetricsOptions {
  url: string;
  filter?: string;
}

export const metricsCommand = new Command('metrics')
  .description('Print Prometheus metrics from a running token gateway')
  .option('-u, --url <url>', 'Gateway base URL', DEFAULT_GATEWAY_URL)
  .option('--filter <prefix>', 'Only print metrics whose name starts with this prefix')
  .action(async (options: MetricsOptions) => {
    try {
      const body = await ofetch(`${options.url}/metrics`, { responseType: 'text', retry: 0 });
      console.log(filterMetrics(body, options.filter));
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error(`❌ Failed to fetch metrics: ${errorMsg}`);
      process.exit(2);
    }
  });

/**
 * 依指標名稱前綴過濾（HELP / TYPE 行一併保留）
 */
export function filterMetrics(body: string, prefix?: string): string {
  if (!prefix) return body;

  return body
    .split('\n')
    .filter((line) => {
      const name = line.startsWith('# ') ? line.split(' ')[2] ?? '' : line;
      return name.startsWith(prefix);
    })
    .join('\n');
}
