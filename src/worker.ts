import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './infra/container.js';
import { ProcessDiscoveryEngine } from './infra/engine/ProcessDiscoveryEngine.js';
import { WorkerExecutor } from './services/WorkerExecutor.js';
import { WorkerPool } from './services/WorkerPool.js';

dotenv.config();

const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

const container = createContainer(env);
const leaseMs = env.TASK_LEASE_SECONDS * 1000;

const engine = new ProcessDiscoveryEngine({
  command: env.DISCOVERY_ENGINE_COMMAND,
  cwd: env.DISCOVERY_ENGINE_CWD,
  resultFile: env.DISCOVERY_RESULT_FILE,
});

const executor = new WorkerExecutor(container.jobService, container.queue, container.store, engine, {
  leaseMs,
});

const pool = new WorkerPool(container.queue, executor, {
  concurrency: env.WORKER_CONCURRENCY,
  leaseMs,
  pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
});

pool.start();
loggerInstance.info('Worker started', {
  concurrency: env.WORKER_CONCURRENCY,
  leaseSeconds: env.TASK_LEASE_SECONDS,
  engine: env.DISCOVERY_ENGINE_COMMAND,
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  loggerInstance.info(`${signal} received, finishing in-flight discoveries`);

  await pool.stop();
  await container.jobService.drainNotifications();
  container.db.close();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        loggerInstance.error('Worker shutdown failed', { error });
        process.exit(1);
      }
    );
  });
}
