import PQueue from 'p-queue';
import { SynthesisError, errorMessage } from '../errors';
import { wait } from '../utils/timeout';

export interface SynthesisQueueConfig {
  concurrency?: number;
  /** Caps how many tasks start per second; unset means no cap. */
  requestsPerSecond?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

const MAX_BACKOFF_MS = 30000;

/**
 * Bounded pool for engine calls. Tasks that fail with a retryable SynthesisError are
 * queued again after a pause, honouring the engine's Retry-After when it sent one.
 */
export class SynthesisQueue {
  private queue: PQueue;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: SynthesisQueueConfig = {}) {
    this.maxRetries = config.maxRetries ?? 1;
    this.retryDelayMs = config.retryDelayMs ?? 1000;

    this.queue = new PQueue({
      concurrency: config.concurrency ?? 4,
      ...(config.requestsPerSecond ? { interval: 1000, intervalCap: config.requestsPerSecond } : {})
    });
  }

  async execute<T>(fn: () => Promise<T>, retryCount = 0): Promise<T> {
    try {
      return await this.queue.add(() => fn(), { throwOnTimeout: true });
    } catch (error) {
      if (retryCount < this.maxRetries && error instanceof SynthesisError && error.retryable) {
        const delay = this.calculateBackoff(error);
        console.warn(`Retry ${retryCount + 1}/${this.maxRetries} after ${delay}ms: ${errorMessage(error)}`);
        await wait(delay);
        return this.execute(fn, retryCount + 1);
      }
      throw error;
    }
  }

  private calculateBackoff(error: SynthesisError): number {
    if (error.retryAfterSeconds !== undefined) {
      return Math.min(error.retryAfterSeconds * 1000, MAX_BACKOFF_MS);
    }
    return this.retryDelayMs;
  }

  get size(): number {
    return this.queue.size;
  }

  get pending(): number {
    return this.queue.pending;
  }
}
