export interface DiscoveryRequest {
  jobId: string;
  logPath: string;
  configPath: string | null;
  outputDir: string;
  /** Aborted when the task is withdrawn from this worker; the engine stops and rejects */
  signal?: AbortSignal;
}

export interface DiscoveryResult {
  fileName: string;
  content: Buffer;
}

/**
 * The external discovery algorithm. Opaque, long-running, single job at a time.
 * Rejects with EngineError when discovery fails.
 */
export interface DiscoveryEngine {
  run(request: DiscoveryRequest): Promise<DiscoveryResult>;
}
