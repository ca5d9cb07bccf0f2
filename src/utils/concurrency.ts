import { setTimeout as delay } from 'timers/promises';

export interface MapOptions {
  limit: number;
  // Once aborted, no further items are started
  signal?: AbortSignal;
}

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

/**
 * Runs `worker` over `items` with at most `limit` in flight. Results keep the
 * input order; items never started because of an abort come back as skipped.
 */
export function mapWithConcurrency<T, R>(
  items: T[],
  options: MapOptions,
  worker: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results = items.map((): Settled<R> => ({ status: 'skipped' }));
  const limit = Math.max(1, options.limit);
  let next = 0;
  let active = 0;

  return new Promise((resolve) => {
    const launch = () => {
      const stopped = options.signal?.aborted ?? false;
      if ((stopped || next >= items.length) && active === 0) {
        resolve(results);
        return;
      }
      while (!stopped && active < limit && next < items.length) {
        const idx = next++;
        active++;
        worker(items[idx], idx)
          .then(
            value => { results[idx] = { status: 'fulfilled', value }; },
            reason => { results[idx] = { status: 'rejected', reason }; }
          )
          .finally(() => { active--; launch(); });
      }
    };
    launch();
  });
}

/** Resolves after `ms`, rejects early with an AbortError when `signal` fires. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}

/**
 * Child controller that aborts when the parent aborts or `timeoutMs` elapses.
 * Call `dispose` once the guarded operation settles.
 */
export function linkedTimeout(timeoutMs: number, parent?: AbortSignal): {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
} {
  const controller = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
