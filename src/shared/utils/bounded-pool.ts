const DEFAULT_CONCURRENCY = 4;

export type PoolOutcome<T> = { status: "done"; value: T } | { status: "cancelled" };

export interface PoolOptions {
  concurrency?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface LinkedAbort {
  signal: AbortSignal;
  abort: () => void;
  dispose: () => void;
}

/**
 * Runs `task(index, signal)` for every index in `[0, count)` with at most
 * `concurrency` tasks in flight. Each task fills only its own slot.
 *
 * Once the signal fires (caller signal, timeout or a task throwing) no new
 * task starts and in-flight slots settle as cancelled; their late results are
 * dropped. A throwing task aborts the rest and its error is rethrown.
 */
export async function runBounded<T>(
  count: number,
  task: (index: number, signal: AbortSignal) => Promise<T>,
  options: PoolOptions = {},
): Promise<Array<PoolOutcome<T>>> {
  const abort = linkAbort(options.signal, options.timeoutMs);
  const slots = Array.from({ length: count }, (): PoolOutcome<T> | undefined => undefined);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < count && !abort.signal.aborted) {
      const index = nextIndex;
      nextIndex += 1;
      slots[index] = await untilAborted(task(index, abort.signal), abort.signal);
    }
  };

  try {
    await Promise.all(
      Array.from({ length: Math.min(normalizeConcurrency(options.concurrency), count) }, () => worker()),
    );
  } catch (error) {
    abort.abort();
    throw error;
  } finally {
    abort.dispose();
  }

  return slots.map((slot): PoolOutcome<T> => slot ?? { status: "cancelled" });
}

export function normalizeConcurrency(value: number | undefined): number {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  return DEFAULT_CONCURRENCY;
}

/** One signal that fires when the caller's signal fires, the timeout elapses, or `abort()` is called. */
export function linkAbort(signal: AbortSignal | undefined, timeoutMs: number | undefined): LinkedAbort {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  const timer =
    typeof timeoutMs === "number" && Number.isFinite(timeoutMs) && timeoutMs > 0
      ? setTimeout(onAbort, timeoutMs)
      : null;

  return {
    signal: controller.signal,
    abort: onAbort,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", onAbort);
    },
  };
}

function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<PoolOutcome<T>> {
  return new Promise<PoolOutcome<T>>((resolve, reject) => {
    const onAbort = (): void => resolve({ status: "cancelled" });
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    task
      .then((value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(signal.aborted ? { status: "cancelled" } : { status: "done", value });
      })
      .catch((error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      });
  });
}
