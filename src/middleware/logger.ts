import { Middleware } from 'koa';
import logger from '../utils/logger';
import { IGNORE_URLS_FOR_LOGGING_BY_PREFIX } from '../config/env';

function parseJsonList(value: string): unknown {
  try {
    return JSON.parse(value.replace(/'/g, '"'));
  } catch {
    return undefined;
  }
}

// Parse the prefixes string into an array (e.g., "['/health','/metrics']" => ['/health','/metrics'])
export function parsePrefixes(prefixes: string): string[] {
  const parsed = parseJsonList(prefixes);
  if (Array.isArray(parsed)) {
    return parsed.filter((p): p is string => typeof p === 'string' && p.length > 0);
  }
  // Fallback: split by comma and trim
  return prefixes
    .replace(/[[\]']/g, '')
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
}

export function createLoggerMiddleware(ignoredPrefixes: string[]): Middleware {
  return async (ctx, next) => {
    if (ignoredPrefixes.some((prefix) => ctx.path.startsWith(prefix))) {
      await next();
      return;
    }

    const reqId = `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
    const start = Date.now();
    logger.info({
      timestamp: new Date().toISOString(),
      reqId,
      method: ctx.method,
      path: ctx.path,
      event: 'START',
    });

    try {
      await next();
      logger.info({
        timestamp: new Date().toISOString(),
        reqId,
        status: ctx.status,
        event: 'END',
        durationMs: Date.now() - start,
      });
    } catch (err) {
      logger.error({
        timestamp: new Date().toISOString(),
        reqId,
        event: 'ERROR',
        error: err instanceof Error ? err.message : String(err),
        durationMs: Date.now() - start,
      });
      throw err;
    }
  };
}

export const loggerMiddleware: Middleware = createLoggerMiddleware(parsePrefixes(IGNORE_URLS_FOR_LOGGING_BY_PREFIX));
