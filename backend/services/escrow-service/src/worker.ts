import { createEscrowCore } from './app';
import { loadConfig } from './config';
import { closeConnection, testConnection } from './config/database';
import { ConnectionError, errorMessage, isOperationalError, wrapError } from './errors';
import { logger } from './utils/logger';

const SERVICE_NAME = process.env.SERVICE_NAME || 'escrow-service';

async function startWorker(): Promise<void> {
  logger.info(`Starting ${SERVICE_NAME} dispute eligibility worker...`);

  const config = loadConfig();
  const core = await createEscrowCore(config);
  if (core.db && !(await testConnection(core.db))) {
    throw new ConnectionError('Database is unreachable', { host: config.database.host });
  }

  core.disputeScanJob.start();
  logger.info(`${SERVICE_NAME} worker running`, {
    network: config.network,
    intervalMs: config.disputeScan.intervalMs,
    graceSeconds: config.disputeScan.graceSeconds,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down ${SERVICE_NAME} worker...`);
    core.disputeScanJob.stop();

    try {
      if (core.db) {
        await closeConnection(core.db);
      }
      logger.info(`${SERVICE_NAME} worker shutdown complete`);
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

startWorker().catch((error: unknown) => {
  const failure = wrapError(error);
  logger.error(`Failed to start ${SERVICE_NAME} worker`, {
    error: failure.message,
    code: failure.code,
    operational: isOperationalError(failure),
    stack: failure.stack,
  });
  process.exit(1);
});
