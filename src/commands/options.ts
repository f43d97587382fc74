/**
 * 指令參數解析
 */

import { InvalidArgumentError } from 'commander';

export function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535 || String(port) !== value.trim()) {
    throw new InvalidArgumentError(`invalid port: ${value}`);
  }
  return port;
}

export function parsePositiveSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`expected a positive number of seconds, got: ${value}`);
  }
  return seconds;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Worker 用戶端名稱：後綴 > POD_NAME > hostname
 */
export function workerClientName(suffix: string | undefined, env: NodeJS.ProcessEnv, hostname: string): string {
  const base = 'Token Worker';
  if (suffix) return `${base}-${suffix}`;
  if (env.POD_NAME) return `${base}-${env.POD_NAME}`;
  if (hostname) return `${base}-${hostname}`;
  return base;
}

/**
 * 收到 SIGINT / SIGTERM 時執行一次 shutdown
 */
export function onShutdownSignal(shutdown: () => Promise<void>): void {
  let shuttingDown = false;
  const handler = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`Received ${signal}, shutting down...`);
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}
