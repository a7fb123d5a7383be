export function nowIso() {
  return new Date().toISOString();
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, Math.max(0, ms));
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message;
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message || "unknown error");
  }
  return String(error || "unknown error");
}

export function shortError(error: unknown) {
  return errorMessage(error).replace(/\s+/g, " ").slice(0, 220);
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with `createTimeoutError()` on expiry even if the task ignores
 * the signal; the timer is always cleared.
 */
export async function runWithTimeout<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  createTimeoutError: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = createTimeoutError();
      controller.abort(error);
      reject(error);
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
