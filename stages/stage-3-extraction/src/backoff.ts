export interface BackoffOptions {
  backoffMs: number;
  maxBackoffMs?: number;
  /** Fraction of the delay to randomize, e.g. 0.2 = ±20%. */
  jitter?: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

function withJitter(value: number, jitter: number, random: () => number): number {
  const delta = value * jitter;
  return value + (random() * 2 - 1) * delta;
}

/** Exponential delay before the n-th resend (1-based), capped, with jitter. */
export function computeBackoff(
  retry: number,
  options?: Partial<BackoffOptions>,
  random: () => number = Math.random
): number {
  const policy = { ...DEFAULT_BACKOFF, ...(options ?? {}) };
  const raw = policy.backoffMs * Math.pow(2, Math.max(0, retry - 1));
  const capped = Math.min(raw, policy.maxBackoffMs ?? raw);
  const delay = policy.jitter ? withJitter(capped, policy.jitter, random) : capped;
  return Math.max(0, delay);
}

// 取消时提前返回，不抛错；由调用方检查 signal 决定后续
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
