import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './infra/container.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const container = createContainer(env);
const app = createApp(container);

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    storagePath: env.STORAGE_PATH,
    retentionSeconds: env.RETENTION_SECONDS,
  });

  container.scheduler.start();
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  loggerInstance.info(`${signal} received, shutting down gracefully`);

  container.scheduler.stop();

  await new Promise<void>((resolve) => {
    server.close((error) => {
      if (error) {
        loggerInstance.warn('HTTP server close reported an error', { error: error.message });
      }
      resolve();
    });
  });
  loggerInstance.info('Server closed');

  await container.jobService.drainNotifications();
  container.db.close();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        loggerInstance.error('Shutdown failed', { error });
        process.exit(1);
      }
    );
  });
}

export { app };
