import { TimeoutError } from "./errors";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
};

/**
 * Delay to wait after the given failed attempt (1-indexed).
 *
 * | Failed attempt | Delay (base 200, x2) |
 * |----------------|----------------------|
 * | 1              | 200ms                |
 * | 2              | 400ms                |
 * | 3              | 800ms                |
 *
 * Capped at `maxDelayMs`.
 */
export const backoffDelay = (
  failedAttempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): number => {
  if (failedAttempt < 1) return 0;
  const delay =
    policy.baseDelayMs * Math.pow(policy.backoffMultiplier, failedAttempt - 1);
  return Math.min(delay, policy.maxDelayMs);
};

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([run(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryHooks {
  onRetry?: (error: Error, failedAttempt: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

/**
 * Runs `task` until it resolves or `policy.maxAttempts` attempts have failed.
 * The last error is returned rather than thrown.
 */
export async function retry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError = new Error("retry: no attempt made");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < maxAttempts) {
        const delay = backoffDelay(attempt, policy);
        hooks.onRetry?.(lastError, attempt, delay);
        await sleep(delay);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
