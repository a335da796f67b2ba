import { Hono } from 'hono';
import type { Logger } from 'pino';
import {
  dripRoutes,
  type DripRoutesDeps,
  type UserCollection,
} from './interface/drip-routes.js';
import type { Env } from './interface/env.js';
import { errorHandler } from './interface/error-handler.js';
import { requestLogger } from './interface/request-logger.js';

export type { Env } from './interface/env.js';
export type { UserCollection } from './interface/drip-routes.js';

export interface AppDeps<Q extends UserCollection<Q>> extends DripRoutesDeps<Q> {
  logger: Logger;
}

export function createApp<Q extends UserCollection<Q>>(deps: AppDeps<Q>): Hono<Env> {
  const app = new Hono<Env>();

  // Global middleware
  app.use('*', requestLogger(deps.logger));
  app.onError(errorHandler());

  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      service: 'drip-engine',
      timestamp: new Date().toISOString(),
    }),
  );

  app.route('/', dripRoutes(deps));

  return app;
}
