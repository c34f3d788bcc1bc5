export interface ArtifactEntry {
  jobId: string;
  modifiedAt: Date;
}

/**
 * Job-addressed artifact namespace. References have the form `<jobId>/<name>`.
 * Every artifact belongs to exactly one job and is deleted with it.
 * Implementations throw StorageError on failure.
 */
export interface ArtifactStore {
  put(jobId: string, name: string, content: Buffer | string): Promise<string>;
  read(ref: string): Promise<Buffer>;
  exists(ref: string): Promise<boolean>;
  /** Absolute location of a reference, for collaborators that need a file path */
  resolve(ref: string): string;
  /** Scratch directory for the engine, created on demand and deleted with the job */
  workspace(jobId: string): Promise<string>;
  /** Idempotent: deleting a job without artifacts succeeds */
  deleteJob(jobId: string): Promise<void>;
  listJobEntries(): Promise<ArtifactEntry[]>;
}

export function artifactRef(jobId: string, name: string): string {
  return `${jobId}/${name}`;
}

export function artifactName(ref: string): string {
  const index = ref.lastIndexOf('/');
  return index === -1 ? ref : ref.slice(index + 1);
}

export const EVENT_LOG_ARTIFACT = 'event_log';
export const CONFIGURATION_ARTIFACT = 'configuration.yaml';
export const WORKSPACE_ARTIFACT = 'work';

/**
 * Names taken by a job's inputs and engine workspace. A stored result must not use them.
 */
export function isReservedArtifactName(name: string): boolean {
  return (
    name === CONFIGURATION_ARTIFACT ||
    name === WORKSPACE_ARTIFACT ||
    name === EVENT_LOG_ARTIFACT ||
    name.startsWith(`${EVENT_LOG_ARTIFACT}.`)
  );
}
