import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';

export type BackgroundTask = () => Promise<unknown>;

export interface BackgroundTaskQueueOptions {
  /** Join a task already running for the same key instead of starting another. */
  singleFlight?: boolean;
}

/**
 * Fire-and-forget runner for cache population. Each task carries an
 * idempotency key; callers never wait on it and never see its errors.
 */
export class BackgroundTaskQueue {
  private readonly singleFlight: boolean;
  private readonly inflight = new Set<Promise<void>>();
  private readonly running = new Map<string, number>();

  constructor(options: BackgroundTaskQueueOptions = {}) {
    this.singleFlight = options.singleFlight ?? false;
  }

  get size(): number {
    return this.inflight.size;
  }

  isRunning(key: string): boolean {
    return (this.running.get(key) ?? 0) > 0;
  }

  /**
   * Starts `task` detached from the caller. Returns false when the task was
   * folded into one already running for `key`.
   */
  enqueue(key: string, task: BackgroundTask): boolean {
    if (this.singleFlight && this.isRunning(key)) {
      logger.info('BACKGROUND_DOWNLOAD_JOINED', { keyword: key });
      return false;
    }

    this.running.set(key, (this.running.get(key) ?? 0) + 1);
    const tracked: Promise<void> = this.run(key, task).finally(() => {
      this.inflight.delete(tracked);
      this.release(key);
    });
    this.inflight.add(tracked);
    return true;
  }

  /**
   * Resolves once every task in flight, including ones started while
   * waiting, has settled.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  private async run(key: string, task: BackgroundTask): Promise<void> {
    const startedAt = Date.now();
    logger.info('BACKGROUND_DOWNLOAD_START', { keyword: key });
    try {
      await task();
      logger.info('BACKGROUND_DOWNLOAD_COMPLETE', {
        keyword: key,
        duration: `${((Date.now() - startedAt) / 1000).toFixed(3)}s`,
      });
    } catch (error) {
      logger.error('BACKGROUND_DOWNLOAD_ERROR', { keyword: key, error: errorMessage(error) });
    }
  }

  private release(key: string): void {
    const remaining = (this.running.get(key) ?? 1) - 1;
    if (remaining > 0) {
      this.running.set(key, remaining);
    } else {
      this.running.delete(key);
    }
  }
}
