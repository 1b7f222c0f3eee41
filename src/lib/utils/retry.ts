export interface RetryCallContext {
  /**
   * 1-based index of the attempt being executed.
   */
  attempt: number;
  maxAttempts: number;
  /**
   * Aborted once the caller gives up; operations should pass it to their I/O.
   */
  signal?: AbortSignal;
}

export interface RetryAttemptContext extends RetryCallContext {
  /**
   * Delay in milliseconds that will be awaited before the next attempt.
   */
  delayMs: number;
}

export interface RetryWithBackoffOptions {
  /**
   * Maximum number of attempts (including the initial attempt). Defaults to 3.
   */
  maxAttempts?: number;
  /**
   * Delay in milliseconds before the first retry. Defaults to 500ms.
   */
  initialDelayMs?: number;
  /**
   * Multiplier applied to the delay after each retry. Defaults to 2.
   */
  multiplier?: number;
  /**
   * Stops scheduling attempts and interrupts the backoff wait when aborted.
   */
  signal?: AbortSignal;
  onRetry?(error: unknown, context: RetryAttemptContext): void | Promise<void>;
  /**
   * When omitted, all errors except `NonRetryableError` instances are retried.
   */
  shouldRetry?(error: unknown, context: RetryAttemptContext): boolean;
}

export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "NonRetryableError";

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

function defaultShouldRetry(error: unknown): boolean {
  return !(error instanceof NonRetryableError);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Operation aborted");
}

export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw abortReason(signal);
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error("Operation aborted"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function retryWithBackoff<T>(
  operation: (context: RetryCallContext) => Promise<T>,
  options: RetryWithBackoffOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 500,
    multiplier = 2,
    signal,
    onRetry,
    shouldRetry = defaultShouldRetry
  } = options;

  if (maxAttempts < 1) {
    throw new Error("maxAttempts must be at least 1");
  }

  let delay = initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      return await operation({ attempt, maxAttempts, signal });
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || signal?.aborted) {
        break;
      }

      const retryContext: RetryAttemptContext = {
        attempt,
        maxAttempts,
        signal,
        delayMs: delay
      };

      if (!shouldRetry(error, retryContext)) {
        throw error;
      }

      if (onRetry) {
        await onRetry(error, retryContext);
      }

      await wait(retryContext.delayMs, signal);
      delay = Math.max(delay * multiplier, retryContext.delayMs * multiplier);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError ?? "Retry failed"));
}
