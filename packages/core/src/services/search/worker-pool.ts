import pLimit from 'p-limit';
import { ConfigurationError, ProviderError } from '@quarry/shared/src/utils/errors.js';

export interface WorkerTaskOptions {
  readonly timeoutMs: number;
  /** Name reported on the timeout error, usually the provider name. */
  readonly label: string;
}

export interface WorkerPool {
  run<T>(task: (signal: AbortSignal) => Promise<T>, options: WorkerTaskOptions): Promise<T>;
  activeCount(): number;
  pendingCount(): number;
}

/**
 * Bounded pool for outbound provider work. At most `concurrency` tasks run at
 * once; the rest queue without holding up the event loop. The timeout clock
 * starts when a task leaves the queue, and expiry aborts the task's signal.
 */
export function createWorkerPool(concurrency: number): WorkerPool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Worker pool concurrency must be a positive integer, got ${String(concurrency)}`);
  }

  const limit = pLimit(concurrency);

  return {
    run<T>(task: (signal: AbortSignal) => Promise<T>, options: WorkerTaskOptions): Promise<T> {
      return limit(async () => {
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;

        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            controller.abort();
            reject(
              new ProviderError(
                `${options.label} did not answer within ${String(options.timeoutMs)}ms`,
                options.label,
                'timeout',
              ),
            );
          }, options.timeoutMs);
        });

        try {
          return await Promise.race([task(controller.signal), timeout]);
        } finally {
          clearTimeout(timer);
        }
      });
    },

    activeCount(): number {
      return limit.activeCount;
    },

    pendingCount(): number {
      return limit.pendingCount;
    },
  };
}
