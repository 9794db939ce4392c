export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Races `task` against a timer. The task keeps running after a timeout; callers
 * that own a cancellable resource must cancel it themselves.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Hands `call` a signal that aborts after `timeoutMs` or with `parent`, and waits for the
 * call itself to settle. A call that ran out of time rejects with `onTimeout()`.
 */
export async function withDeadline<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let expired: Error | undefined;
  const timer = setTimeout(() => {
    expired = onTimeout();
    controller.abort(expired);
  }, Math.max(0, timeoutMs));
  try {
    return await call(combineSignals([controller.signal, parent]) ?? controller.signal);
  } catch (error) {
    if (expired) throw expired;
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight and returns the
 * results in input order. Workers are expected to turn their own failures into values.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await worker(next.item, next.index);
    }
  });
  await Promise.all(runners);
  return results;
}

export function combineSignals(signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length === 0) return undefined;
  if (present.length === 1) return present[0];
  return AbortSignal.any(present);
}
