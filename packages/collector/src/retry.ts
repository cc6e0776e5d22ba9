export interface RetryAttempt {
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: RetryableError;
}

export interface RetryOptions {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs?: number;
  readonly onRetry?: (info: RetryAttempt) => void;
  /** Replaces the real timer, mainly for tests. */
  readonly wait?: (ms: number) => Promise<void>;
}

export class RetryableError extends Error {
  readonly retryAfterMs: number | undefined;

  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = "RetryableError";
    this.retryAfterMs = retryAfterMs;
  }
}

export const sleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => setTimeout(resolve, ms));
};

const jitter = (ms: number): number => {
  const spread = Math.floor(ms * 0.2);
  return ms + Math.floor((Math.random() * 2 - 1) * spread);
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxDelayMs = options.maxDelayMs ?? 30_000;
  const wait = options.wait ?? sleep;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof RetryableError) || attempt === options.maxAttempts) {
        throw error;
      }

      const backoff = Math.min(options.baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      const delayMs =
        error.retryAfterMs && error.retryAfterMs > 0
          ? Math.min(error.retryAfterMs, maxDelayMs)
          : jitter(backoff);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }

  throw new Error("Retry exhausted");
}
