import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import type { Logger } from 'pino';
import type { Env } from './env.js';

export function requestLogger(logger: Logger): MiddlewareHandler<Env> {
  return async (c, next) => {
    const requestId = c.req.header('X-Request-Id') ?? randomUUID();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);

    const requestLog = logger.child({ requestId });
    c.set('logger', requestLog);

    const start = Date.now();
    await next();

    const fields = {
      method: c.req.method,
      path: c.req.path,
      statusCode: c.res.status,
      durationMs: Date.now() - start,
    };
    if (c.res.status >= 500) {
      requestLog.error(fields, 'request');
    } else if (c.res.status >= 400) {
      requestLog.warn(fields, 'request');
    } else {
      requestLog.info(fields, 'request');
    }
  };
}
