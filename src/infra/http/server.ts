import { loadConfig } from '../../config.js';
import { createLogger } from '../logger.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { LoggingEventBus } from '../events/loggingEventBus.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger({
  level: config.logLevel,
  serviceName: config.serviceName,
  nodeEnv: config.nodeEnv,
});
const pool = createPool(config.databaseUrl, logger);

const app = createApp({
  config,
  logger,
  userRepo: new PgUserRepo(pool),
  eventBus: new LoggingEventBus(logger),
  healthCheck: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  logger.info('Server running', { url: `http://localhost:${config.port}` });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Failed to close database pool', { err });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
