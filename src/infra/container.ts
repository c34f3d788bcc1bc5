import type { Env } from './env.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { DatabaseAdapter } from './DatabaseAdapter.js';
import { JobRepository } from './repositories/JobRepository.js';
import { JobEventRepository } from './repositories/JobEventRepository.js';
import { SqliteTaskQueue } from './queue/SqliteTaskQueue.js';
import { FileSystemArtifactStore } from './storage/FileSystemArtifactStore.js';
import { CallbackNotifier } from './CallbackNotifier.js';
import type { Notifier } from './CallbackNotifier.js';
import type { ArtifactStore } from './storage/ArtifactStore.js';
import type { TaskQueue } from './queue/TaskQueue.js';
import { JobService } from '../services/JobService.js';
import { JobRetentionService } from '../services/JobRetentionService.js';
import { JobReconciliationService } from '../services/JobReconciliationService.js';
import { MaintenanceScheduler } from '../scheduler/MaintenanceScheduler.js';

export interface Container {
  env: Env;
  clock: Clock;
  db: DatabaseAdapter;
  jobRepo: JobRepository;
  eventRepo: JobEventRepository;
  queue: TaskQueue;
  store: ArtifactStore;
  notifier: Notifier;
  jobService: JobService;
  retentionService: JobRetentionService;
  reconciliationService: JobReconciliationService;
  scheduler: MaintenanceScheduler;
}

export interface ContainerOverrides {
  clock?: Clock;
  db?: DatabaseAdapter;
  notifier?: Notifier;
}

/**
 * Explicit construction of every shared dependency. Both processes build one;
 * each decides which parts it starts.
 */
export function createContainer(env: Env, overrides: ContainerOverrides = {}): Container {
  const clock = overrides.clock ?? systemClock;
  const db = overrides.db ?? new DatabaseAdapter(env);

  const jobRepo = new JobRepository(db);
  const eventRepo = new JobEventRepository(db);
  const queue = new SqliteTaskQueue(db, clock);
  const store = new FileSystemArtifactStore(env.STORAGE_PATH);
  const notifier = overrides.notifier ?? new CallbackNotifier(env.CALLBACK_TIMEOUT_MS);

  const retentionMs = env.RETENTION_SECONDS * 1000;

  const jobService = new JobService(
    jobRepo,
    eventRepo,
    store,
    queue,
    notifier,
    { retentionMs, publicBaseUrl: env.PUBLIC_BASE_URL?.replace(/\/+$/, '') },
    clock
  );

  const retentionService = new JobRetentionService(jobRepo, jobService, store, retentionMs);
  const reconciliationService = new JobReconciliationService(jobRepo, jobService, queue, store, {
    maxProcessingMs: env.MAX_PROCESSING_MINUTES * 60_000,
    dispatchGraceMs: env.DISPATCH_GRACE_SECONDS * 1000,
    maxDeliveryAttempts: env.MAX_DELIVERY_ATTEMPTS,
    retryBackoffMs: env.RETRY_BACKOFF_SECONDS * 1000,
  });

  const scheduler = new MaintenanceScheduler(
    retentionService,
    reconciliationService,
    {
      sweepIntervalSeconds: env.SWEEP_INTERVAL_SECONDS,
      reconcileIntervalSeconds: env.RECONCILE_INTERVAL_SECONDS,
    },
    clock
  );

  return {
    env,
    clock,
    db,
    jobRepo,
    eventRepo,
    queue,
    store,
    notifier,
    jobService,
    retentionService,
    reconciliationService,
    scheduler,
  };
}
