import { describe, it, expect } from 'vitest';
import { ConfigurationError, ProviderError } from '@quarry/shared/src/utils/errors.js';
import { createWorkerPool } from './worker-pool.js';

describe('WorkerPool', () => {
  it('should return the task result', async () => {
    const pool = createWorkerPool(2);
    const result = await pool.run(() => Promise.resolve('done'), { timeoutMs: 1000, label: 'test' });
    expect(result).toBe('done');
  });

  it('should never run more tasks than its concurrency', async () => {
    const pool = createWorkerPool(2);
    let running = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 10));
      running--;
    };

    await Promise.all(
      Array.from({ length: 6 }, () => pool.run(task, { timeoutMs: 1000, label: 'test' })),
    );

    expect(peak).toBe(2);
  });

  it('should reject with a timeout ProviderError and abort the task signal', async () => {
    const pool = createWorkerPool(1);
    let observedSignal: AbortSignal | undefined;

    const run = pool.run(
      (signal) => {
        observedSignal = signal;
        return new Promise<string>(() => undefined);
      },
      { timeoutMs: 20, label: 'slow-provider' },
    );

    await expect(run).rejects.toMatchObject({
      name: 'ProviderError',
      provider: 'slow-provider',
      kind: 'timeout',
    });
    await expect(run).rejects.toBeInstanceOf(ProviderError);
    expect(observedSignal?.aborted).toBe(true);
  });

  it('should free the slot after a timeout', async () => {
    const pool = createWorkerPool(1);
    const stuck = pool.run(() => new Promise<string>(() => undefined), {
      timeoutMs: 10,
      label: 'stuck',
    });
    await expect(stuck).rejects.toBeInstanceOf(ProviderError);

    const next = await pool.run(() => Promise.resolve('next'), { timeoutMs: 1000, label: 'ok' });
    expect(next).toBe('next');
  });

  it('should report queued tasks while the pool is saturated', async () => {
    const pool = createWorkerPool(1);
    let release: () => void = () => undefined;
    const blocker = pool.run(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
      { timeoutMs: 1000, label: 'blocker' },
    );
    const queued = pool.run(() => Promise.resolve('queued'), { timeoutMs: 1000, label: 'queued' });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(pool.activeCount()).toBe(1);
    expect(pool.pendingCount()).toBe(1);

    release();
    await blocker;
    expect(await queued).toBe('queued');
  });

  it('should reject an invalid concurrency', () => {
    expect(() => createWorkerPool(0)).toThrow(ConfigurationError);
  });
});
