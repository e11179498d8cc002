export interface RetryOptions {
  retries: number;
  delayMs: number;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve();
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// Linear backoff: attempt n waits delayMs * n before the next try.
export async function withRetries<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.retries);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (options.signal?.aborted) {
        throw error;
      }
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }
      if (attempt < attempts) {
        await delay(options.delayMs * attempt, options.signal);
        if (options.signal?.aborted) {
          throw error;
        }
      }
    }
  }

  throw lastError;
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs` or when
 * `parentSignal` aborts, whichever comes first. A timeout rejects with
 * {@link TimeoutError}; a parent abort rethrows whatever the operation threw.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutHandle = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const forwardAbort = (): void => controller.abort();
  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    return await operation(controller.signal);
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
    parentSignal?.removeEventListener("abort", forwardAbort);
  }
}
