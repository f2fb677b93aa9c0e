export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Fixed pause between attempts. */
  readonly delayMs: number;
}

export function retryPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (delayMs < 0) {
    throw new RangeError(`delayMs must not be negative, got ${delayMs}`);
  }
  return Object.freeze({ maxAttempts, delayMs });
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Called after a failed attempt that will be retried. */
  onRetry?: (attempt: number, error: Error) => void;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Run `fn` until it resolves or the policy's attempts are used up.
 * The error of the last attempt is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt >= policy.maxAttempts) break;

      hooks.onRetry?.(attempt, lastError);
      await sleep(policy.delayMs);
    }
  }

  throw lastError;
}
