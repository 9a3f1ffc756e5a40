import PQueue from "p-queue";

export interface FanOutOptions<T> {
  keys: readonly string[];
  concurrency: number;
  timeoutMs: number;
  run: (key: string, signal: AbortSignal) => Promise<T>;
  onError: (key: string, error: unknown) => T;
  onTimeout: (key: string) => T;
  onSettled?: (key: string, outcome: T, completed: number) => void;
}

type Settlement<T> = { aborted: false; value: T } | { aborted: true };

/**
 * Runs `run` once per key with at most `concurrency` calls in flight and
 * collects the outcomes by key, in the order of `keys`.
 *
 * When `timeoutMs` elapses the queue stops starting work, in-flight calls are
 * signalled to abort, and every key still without an outcome gets
 * `onTimeout(key)`. The returned promise settles only after the queue has
 * drained, so no task writes into the result afterwards.
 *
 * `onSettled` runs once per recorded outcome. If it throws, the outcome stays
 * as recorded and the first such error rejects the call once the queue drains.
 */
export async function fanOut<T>(options: FanOutOptions<T>): Promise<Map<string, T>> {
  const settled = new Map<string, T>();
  const controller = new AbortController();
  const queue = new PQueue({ concurrency: options.concurrency });
  let completed = 0;
  const callbackErrors: unknown[] = [];

  const record = (key: string, outcome: T): void => {
    settled.set(key, outcome);
    completed += 1;

    try {
      options.onSettled?.(key, outcome, completed);
    } catch (error) {
      callbackErrors.push(error);
    }
  };

  const settle = async (key: string): Promise<Settlement<T>> => {
    try {
      return await settleBeforeAbort(options.run(key, controller.signal), controller.signal);
    } catch (error) {
      return controller.signal.aborted ? { aborted: true } : { aborted: false, value: options.onError(key, error) };
    }
  };

  for (const key of options.keys) {
    void queue.add(async () => {
      if (controller.signal.aborted) {
        return;
      }

      const settlement = await settle(key);
      if (!settlement.aborted) {
        record(key, settlement.value);
      }
    });
  }

  const deadline = setTimeout(() => {
    queue.clear();
    controller.abort();
  }, options.timeoutMs);

  try {
    await queue.onIdle();
  } finally {
    clearTimeout(deadline);
  }

  if (callbackErrors.length > 0) {
    throw callbackErrors[0];
  }

  const ordered = new Map<string, T>();
  for (const key of options.keys) {
    const outcome = settled.get(key);
    ordered.set(key, outcome === undefined ? options.onTimeout(key) : outcome);
  }
  return ordered;
}

function settleBeforeAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<Settlement<T>> {
  return new Promise<Settlement<T>>((resolve, reject) => {
    const onAbort = (): void => resolve({ aborted: true });

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve({ aborted: false, value });
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
