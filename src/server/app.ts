/**
 * HTTP Front Door
 * Express 路由：/health、/health/status、/metrics、/token
 */

import { randomUUID } from 'node:crypto';
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import { loggers } from '../lib/logger.js';
import { getMetricsContentType, getMetricsSnapshot } from '../lib/metrics.js';
import { getHttpStatusCode, type HealthCheckService } from '../services/health.js';
import {
  INTERNAL_ERROR_MESSAGE,
  isSkipCache,
  type GatewayResponse,
  type TokenGateway,
} from '../services/token-gateway.js';

export interface AppDependencies {
  gateway: TokenGateway;
  health: HealthCheckService;
  /** 請求內容上限 (default: '64kb') */
  bodyLimit?: string;
}

const QUIET_PATHS = new Set(['/health', '/health/status', '/metrics']);

/**
 * 取得或產生 x-request-id
 */
function requestId(): RequestHandler {
  return (req, res, next) => {
    const header = req.headers['x-request-id'];
    const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
    res.locals.requestId = id;
    res.setHeader('x-request-id', id);
    next();
  };
}

/**
 * 請求日誌：狀態碼決定級別
 */
function requestLogger(): RequestHandler {
  return (req, res, next) => {
    if (QUIET_PATHS.has(req.path)) {
      next();
      return;
    }

    const startTime = Date.now();
    res.on('finish', () => {
      const context = {
        requestId: String(res.locals.requestId),
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      };
      if (res.statusCode >= 500) {
        loggers.gateway.error('HTTP request failed', null, context);
      } else if (res.statusCode >= 400) {
        loggers.gateway.warn('HTTP request rejected', context);
      } else {
        loggers.gateway.info('HTTP request completed', context);
      }
    });
    next();
  };
}

function sendGatewayResponse(res: express.Response, response: GatewayResponse): void {
  if ('text' in response) {
    res.status(response.status).type('text/plain').send(response.text);
    return;
  }
  res.status(response.status).json(response.body);
}

function errorHandler(): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    const status = statusOf(err);
    loggers.gateway.error(
      'Unhandled error in request pipeline',
      err instanceof Error ? err : new Error(String(err)),
      { requestId: String(res.locals.requestId), statusCode: status }
    );

    if (res.headersSent) return;
    res
      .status(status)
      .type('text/plain')
      .send(status >= 500 ? INTERNAL_ERROR_MESSAGE : 'Invalid request');
  };
}

/**
 * body-parser 等中介軟體的錯誤帶有 status（例如 413）
 */
function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const status = Number(err.status);
    if (Number.isInteger(status) && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export function createApp(deps: AppDependencies): Express {
  const { gateway, health } = deps;
  const app = express();

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.status(200).type('text/plain').send('OK');
  });

  app.get('/health/status', (_req, res) => {
    const result = health.performHealthCheck();
    res.status(getHttpStatusCode(result.status)).json(result);
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.status(200).type(getMetricsContentType()).send(metrics);
    } catch (error) {
      next(error);
    }
  });

  // 原始內容交給 validator 解析，不依 Content-Type 過濾
  const rawBody = express.raw({ type: () => true, limit: deps.bodyLimit ?? '64kb' });

  app.post('/token', rawBody, async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const response = await gateway.issueToken(Buffer.isBuffer(body) ? body : '', {
        skipCache: isSkipCache(req.query.skip_cache),
        requestId: String(res.locals.requestId),
      });
      sendGatewayResponse(res, response);
    } catch (error) {
      next(error);
    }
  });

  app.all('/token', (_req, res) => {
    res.status(405).type('text/plain').send('Method not allowed');
  });

  app.use((_req, res) => {
    res.status(404).type('text/plain').send('Not Found');
  });

  app.use(errorHandler());

  return app;
}
