/**
 * Server entry point: prepare the asset directories, start HTTP, and sweep old
 * recordings from the temp directory on an interval.
 */
import { createApp } from './api/app';
import { config, ensureDirectories, getConfigSummary, validateConfig } from './config';
import { logger } from './config/logger';
import { cleanTempFiles } from './utils/audio';
import { errorMessage } from './utils/errors';

async function sweepTemp(): Promise<void> {
  try {
    await cleanTempFiles(config.paths.tempDir, config.cleanup.tempMaxAgeHours);
  } catch (e) {
    logger.warn('Temp cleanup failed', { error: errorMessage(e) });
  }
}

function start() {
  ensureDirectories(config);
  logger.info('Configuration', getConfigSummary(config));
  for (const problem of validateConfig(config)) {
    logger.warn(`Config: ${problem}`);
  }

  const app = createApp();
  const host = process.env.HOST || '0.0.0.0';
  const server = app.listen(config.port, host, () => {
    logger.info(`Server listening on ${host}:${config.port} (env: ${config.env})`);
  });

  void sweepTemp();
  const cleanup = setInterval(() => void sweepTemp(), config.cleanup.intervalMinutes * 60 * 1000);
  cleanup.unref();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    clearInterval(cleanup);
    server.close((err) => {
      if (err) {
        logger.error('Server close failed', { error: errorMessage(err) });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

try {
  start();
} catch (e) {
  logger.error('Startup failed', { error: errorMessage(e) });
  process.exit(1);
}
