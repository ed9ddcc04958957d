/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

/**
 * Sinon fake timers install their overrides on {@link globalThis}; the timers
 * are looked up on every call so the supervision loop and termination grace
 * periods follow the fake clock in tests.
 */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, delayMs);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/**
 * Resolves after {@link delayMs}. When {@link signal} aborts first the promise
 * resolves early with `false`; otherwise it resolves with `true`.
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const onAbort = () => {
      runtimeClearTimeout(handle);
      resolve(false);
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Races {@link promise} against a timer. Resolves `true` when the promise
 * settled in time, `false` on timeout. Rejections are treated as settled.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let handle: TimeoutHandle | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    handle = runtimeSetTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true,
      ),
      timeout,
    ]);
  } finally {
    if (handle !== undefined) {
      runtimeClearTimeout(handle);
    }
  }
}
