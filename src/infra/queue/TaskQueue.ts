/**
 * Task carried from the API to the workers. Artifact references are store-relative.
 */
export interface TaskMessage {
  jobId: string;
  logRef: string;
  configRef: string | null;
}

/**
 * A message handed to one worker. Only the holder of `deliveryId` may acknowledge it.
 */
export interface TaskDelivery {
  deliveryId: string;
  message: TaskMessage;
  deliveries: number;
  leasedUntil: Date;
}

export interface ExpiredLease {
  jobId: string;
  deliveryId: string;
  leasedBy: string | null;
  leasedUntil: Date;
}

/**
 * Broker-agnostic task queue contract.
 *
 * Delivery is at-least-once: a message stays in the queue until it is acknowledged.
 * A lease that runs out is not redelivered by the queue itself; the reconciliation
 * sweep finds it through `listExpiredLeases` and decides between requeue and failure.
 * Implementations throw DispatchError when the queue is unavailable.
 */
export interface TaskQueue {
  /** Queues a task. Returns false when the job already has a queued or leased task. */
  enqueue(message: TaskMessage, availableAt?: Date): Promise<boolean>;
  reserve(workerId: string, leaseMs: number): Promise<TaskDelivery | null>;
  /** Heartbeat. Returns false when the delivery is no longer held. */
  extendLease(delivery: TaskDelivery, leaseMs: number): Promise<boolean>;
  /** Removes the task. Returns false when the delivery is no longer held. */
  ack(delivery: TaskDelivery): Promise<boolean>;
  /** Puts a leased task back to ready, to become available at `availableAt`. */
  release(jobId: string, availableAt: Date): Promise<boolean>;
  remove(jobId: string): Promise<void>;
  has(jobId: string): Promise<boolean>;
  listExpiredLeases(now: Date): Promise<ExpiredLease[]>;
}
