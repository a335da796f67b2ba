import { DripApplicationService } from '@dripline/drip-domain';
import { serve } from '@hono/node-server';
import pino from 'pino';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createDatabase } from './infrastructure/database.js';
import { DrizzleQueryable } from './infrastructure/drizzle-queryable.js';
import { DrizzleDripRepository } from './infrastructure/repositories/drizzle-drip-repository.js';
import { DrizzleSentDripRepository } from './infrastructure/repositories/drizzle-sent-drip-repository.js';
import { userSource, usersTable } from './infrastructure/users-table.js';

const config = loadConfig();
const logger = pino({ name: 'drip-engine', level: config.LOG_LEVEL });

function main() {
  const db = createDatabase(config.DATABASE_URL);
  const source = userSource(db, usersTable(config.USERS_TABLE));

  const service = new DripApplicationService(
    new DrizzleDripRepository(db),
    new DrizzleSentDripRepository(db),
    () => new Date(),
  );

  const app = createApp({
    service,
    users: () => DrizzleQueryable.of(source),
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    logger.info({ port: info.port }, 'Drip engine started');
  });

  const shutdown = () => {
    logger.info('Shutting down gracefully...');
    server.close(() => {
      logger.info('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (err) {
  logger.error(err, 'Failed to start drip engine');
  process.exit(1);
}
