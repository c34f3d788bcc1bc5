import { hostname } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { describeError } from '../domain/errors.js';
import type { TaskQueue } from '../infra/queue/TaskQueue.js';
import { logger } from '../infra/logger.js';
import type { TaskHandler } from './WorkerExecutor.js';

export interface WorkerPoolOptions {
  concurrency: number;
  leaseMs: number;
  pollIntervalMs: number;
  /** Prefix of each loop's worker id; host and pid by default */
  name?: string;
}

/**
 * WorkerPool - N independent loops, each reserving and executing one task at a time.
 * `stop` lets in-flight tasks finish; nothing new is reserved afterwards.
 */
export class WorkerPool {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private queue: TaskQueue,
    private executor: TaskHandler,
    private options: WorkerPoolOptions
  ) {}

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    const name = this.options.name ?? `${hostname()}-${process.pid}`;
    const concurrency = Math.max(this.options.concurrency, 1);
    this.loops = Array.from({ length: concurrency }, (_, index) =>
      this.loop(`${name}-${index + 1}`, controller.signal)
    );

    logger.info('Worker pool started', { concurrency, name });
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    logger.info('Worker pool stopped');
  }

  private async loop(workerId: string, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const delivery = await this.queue.reserve(workerId, this.options.leaseMs);
        if (!delivery) {
          await this.idle(signal);
          continue;
        }

        logger.info('Task received', {
          workerId,
          jobId: delivery.message.jobId,
          delivery: delivery.deliveries,
        });
        const result = await this.executor.execute(delivery);
        logger.info('Task finished', { workerId, jobId: delivery.message.jobId, result });
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        logger.error('Worker loop error', { workerId, error: describeError(error) });
        await this.idle(signal);
      }
    }
  }

  private async idle(signal: AbortSignal): Promise<void> {
    try {
      await sleep(this.options.pollIntervalMs, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  }
}
