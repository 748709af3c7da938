// FILE: src/lib/__tests__/concurrency.test.ts

import { describe, it, expect } from 'vitest';

import { runWithConcurrency, withTimeout } from '../concurrency';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('keeps results in input order', async () => {
    const results = await runWithConcurrency([30, 10, 20], 3, async (ms, i) => {
      await sleep(ms);
      return i;
    });
    expect(results).toEqual([0, 1, 2]);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await runWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });
    expect(peak).toBe(2);
  });

  it('treats a concurrency below one as one', async () => {
    const results = await runWithConcurrency(['a', 'b'], 0, async (item) => item.toUpperCase());
    expect(results).toEqual(['A', 'B']);
  });
});

describe('withTimeout', () => {
  it('resolves with the task result when it finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 100, () => new Error('late'))).resolves.toBe('done');
  });

  it('rejects with the timeout error and aborts the task signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout(
      (signal) => {
        seen.signal = signal;
        return new Promise<string>(() => undefined);
      },
      20,
      () => new Error('late')
    );
    await expect(pending).rejects.toThrow('late');
    expect(seen.signal?.aborted).toBe(true);
    expect(seen.signal?.reason).toBeInstanceOf(Error);
  });

  it('passes through a task failure', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('boom');
        },
        100,
        () => new Error('late')
      )
    ).rejects.toThrow('boom');
  });
});
