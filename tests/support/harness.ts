import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Clock } from '../../src/infra/clock.js';
import type { CallbackPayload, Notifier } from '../../src/infra/CallbackNotifier.js';
import { DatabaseAdapter } from '../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../src/infra/repositories/JobRepository.js';
import { JobEventRepository } from '../../src/infra/repositories/JobEventRepository.js';
import { SqliteTaskQueue } from '../../src/infra/queue/SqliteTaskQueue.js';
import { FileSystemArtifactStore } from '../../src/infra/storage/FileSystemArtifactStore.js';
import { JobService } from '../../src/services/JobService.js';
import type { UploadedFile } from '../../src/services/JobService.js';

export const START = new Date('2026-03-01T10:00:00.000Z');

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingNotifier implements Notifier {
  readonly calls: Array<{ url: string; payload: CallbackPayload }> = [];

  async notify(url: string, payload: CallbackPayload): Promise<boolean> {
    this.calls.push({ url, payload });
    return true;
  }
}

export async function createTempDir(prefix = 'discoveries-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}

export function csvLog(content = 'case_id,activity,start_time,end_time,resource\n1,A,t0,t1,r1\n'): UploadedFile {
  return { fileName: 'log.csv', mediaType: 'text/csv', content: Buffer.from(content) };
}

export function yamlConfiguration(content: string): UploadedFile {
  return { fileName: 'configuration.yaml', mediaType: 'application/x-yaml', content: Buffer.from(content) };
}

export interface Harness {
  clock: ManualClock;
  db: DatabaseAdapter;
  jobRepo: JobRepository;
  eventRepo: JobEventRepository;
  queue: SqliteTaskQueue;
  store: FileSystemArtifactStore;
  notifier: RecordingNotifier;
  jobService: JobService;
  storagePath: string;
  retentionMs: number;
  close(): Promise<void>;
}

/**
 * In-process stack: in-memory SQLite, artifacts under a temporary directory.
 */
export async function createHarness(options: { retentionMs?: number; publicBaseUrl?: string } = {}): Promise<Harness> {
  const clock = new ManualClock();
  const db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
  const storagePath = await createTempDir();
  const jobRepo = new JobRepository(db);
  const eventRepo = new JobEventRepository(db);
  const queue = new SqliteTaskQueue(db, clock);
  const store = new FileSystemArtifactStore(storagePath);
  const notifier = new RecordingNotifier();
  const retentionMs = options.retentionMs ?? 60 * 60 * 1000;

  const jobService = new JobService(
    jobRepo,
    eventRepo,
    store,
    queue,
    notifier,
    { retentionMs, publicBaseUrl: options.publicBaseUrl },
    clock
  );

  return {
    clock,
    db,
    jobRepo,
    eventRepo,
    queue,
    store,
    notifier,
    jobService,
    storagePath,
    retentionMs,
    async close() {
      db.close();
      await removeTempDir(storagePath);
    },
  };
}
