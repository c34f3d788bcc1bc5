import type { JobStatus } from '../domain/entities/Job.js';
import { NotificationError, describeError } from '../domain/errors.js';
import { logger, safeUrl } from './logger.js';

export interface CallbackPayload {
  discoveryId: string;
  status: JobStatus;
  resultUrl?: string;
  errorDetail?: string;
}

export interface Notifier {
  /** Single best-effort delivery. Never throws. */
  notify(callbackUrl: string, payload: CallbackPayload): Promise<boolean>;
}

/**
 * Posts terminal job status to the caller-supplied URL.
 * At most one attempt, no retry, no signature.
 */
export class CallbackNotifier implements Notifier {
  constructor(
    private timeoutMs: number,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async notify(callbackUrl: string, payload: CallbackPayload): Promise<boolean> {
    try {
      await this.post(callbackUrl, payload);
      logger.info('Callback delivered', {
        discoveryId: payload.discoveryId,
        status: payload.status,
        url: safeUrl(callbackUrl),
      });
      return true;
    } catch (error) {
      logger.warn('Callback delivery failed', {
        discoveryId: payload.discoveryId,
        url: safeUrl(callbackUrl),
        error: describeError(error),
      });
      return false;
    }
  }

  private async post(callbackUrl: string, payload: CallbackPayload): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(callbackUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NotificationError(`Callback request failed: ${describeError(error)}`);
    }

    if (!response.ok) {
      throw new NotificationError(`Callback endpoint responded with ${response.status}`);
    }
  }
}
