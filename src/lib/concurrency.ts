// ==========================================
// CONCURRENCY HELPERS
// ==========================================

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Results
 * keep the order of `items`.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker() {
    while (true) {
      const i = nextIndex;
      nextIndex += 1;
      if (i >= items.length) return;
      results[i] = await fn(items[i], i);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Run `task` with its own AbortSignal, aborting it and rejecting with
 * `onTimeout()` once `timeoutMs` passes. The rejection does not wait for the
 * task to notice the abort.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const running = task(controller.signal);
  // The task may still reject after the timeout has won the race
  void running.catch(() => undefined);

  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
