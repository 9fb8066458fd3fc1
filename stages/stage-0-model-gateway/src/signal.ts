/**
 * Merge a caller's abort signal with a timeout into one signal.
 * `cancel` must be called once the guarded work settles to clear the timer.
 */

export interface MergedSignal {
  signal?: AbortSignal;
  /** True once the timeout (not the caller) fired the abort. */
  timedOut(): boolean;
  cancel(): void;
}

export function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): MergedSignal {
  if (!abortSignal && !timeoutMs) {
    return { timedOut: () => false, cancel: () => {} };
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let fired = false;

  if (timeoutMs) {
    timeoutId = setTimeout(() => {
      fired = true;
      controller.abort();
    }, timeoutMs);
  }

  const onAbort = () => controller.abort();
  if (abortSignal) {
    if (abortSignal.aborted) {
      controller.abort();
    } else {
      abortSignal.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => fired,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}
