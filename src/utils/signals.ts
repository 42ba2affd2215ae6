/**
 * Abort signal that fires after `timeoutMs`, or earlier if `parent` aborts.
 */
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!parent) return timeout;

  const controller = new AbortController();
  const forward = (source: AbortSignal) => {
    if (!controller.signal.aborted) controller.abort(source.reason);
  };
  if (parent.aborted) {
    forward(parent);
    return controller.signal;
  }
  parent.addEventListener("abort", () => forward(parent), { once: true });
  timeout.addEventListener("abort", () => forward(timeout), { once: true });
  return controller.signal;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer. The timer never keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new Error(message);
      err.name = "TimeoutError";
      reject(err);
    }, timeoutMs);
    timer.unref?.();
  });
  return Promise.race([
    promise.finally(() => {
      if (timer) clearTimeout(timer);
    }),
    timeout,
  ]);
}
