export type RetryOptions<T> = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Treat a resolved value as a failed attempt. The last value is returned once attempts run out. */
  retryIf?: (value: T) => boolean;
  /** Stops further attempts (and any pending delay) once aborted. */
  signal?: AbortSignal;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions<T>,
): Promise<T> {
  const maxAttempts = Math.max(1, opts?.maxAttempts ?? DEFAULTS.maxAttempts);
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULTS.maxDelayMs;

  for (let attempt = 1; ; attempt++) {
    let value: T;
    try {
      value = await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || opts?.signal?.aborted) throw err;
      await pause(attempt);
      continue;
    }
    if (attempt >= maxAttempts || opts?.signal?.aborted || !opts?.retryIf?.(value)) return value;
    await pause(attempt);
  }

  async function pause(attempt: number): Promise<void> {
    const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
    if (delay > 0) await sleep(delay, opts?.signal);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
