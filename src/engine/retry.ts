import { CancelledError, TransientError } from "./errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export interface RetryPolicy {
  /** Total attempt budget. 0 and 1 both mean a single attempt. */
  maxRetries: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  isRetryable: (err: unknown) => boolean;
  /** Apply +/-25% jitter to each delay. Off by default so delays are exact. */
  jitter?: boolean;
}

/**
 * Only TransientError is retried. Anything else a controller throws is
 * treated as permanent.
 */
export function isTransient(err: unknown): boolean {
  return err instanceof TransientError;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  isRetryable: isTransient,
});

/**
 * Check a policy before it is used. Throws on values the backoff
 * arithmetic cannot honor.
 */
export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (!(policy.initialDelayMs > 0)) {
    throw new RangeError(`initialDelayMs must be positive, got ${policy.initialDelayMs}`);
  }
  if (!(policy.backoffMultiplier >= 1)) {
    throw new RangeError(`backoffMultiplier must be >= 1, got ${policy.backoffMultiplier}`);
  }
  return policy;
}

/** Delay before attempt `n` (0-indexed, n >= 1). */
export function backoffDelay(policy: RetryPolicy, n: number): number {
  return policy.initialDelayMs * policy.backoffMultiplier ** (n - 1);
}

/** Add +/-25% jitter to a delay to prevent thundering herd. */
export function jitter(ms: number): number {
  return ms * (0.75 + Math.random() * 0.5);
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-based sleep that rejects with CancelledError as soon as the
 * signal aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Cancelled before backoff sleep"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Cancelled during backoff sleep"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type FailureKind = "transient" | "permanent" | "cancelled";

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; kind: FailureKind; error: unknown; attempts: number };

export interface InvokeOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
  /** Name used in log lines. */
  label?: string;
  /** Called after a retryable failure, before the backoff sleep. */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run `operation` under a bounded exponential-backoff policy.
 *
 * Never rejects: success, exhaustion, a non-retryable error and
 * cancellation all come back as a RetryOutcome. The signal is checked
 * before every attempt and before every sleep, and aborting it wakes a
 * pending sleep immediately.
 */
export async function invoke<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: InvokeOptions = {},
): Promise<RetryOutcome<T>> {
  const { signal, logger = silentLogger, label = "operation" } = options;
  const doSleep = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxRetries);
  let delay = policy.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return { ok: false, kind: "cancelled", error: new CancelledError(), attempts: attempt - 1 };
    }

    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      if (!policy.isRetryable(err)) {
        logger.error(`${label} failed with a non-retryable error: ${describe(err)}`, { attempt });
        return { ok: false, kind: "permanent", error: err, attempts: attempt };
      }

      if (attempt >= maxAttempts) {
        logger.error(`${label} failed after ${attempt} attempt(s): ${describe(err)}`, { attempt });
        return { ok: false, kind: "transient", error: err, attempts: attempt };
      }

      if (signal?.aborted) {
        return { ok: false, kind: "cancelled", error: new CancelledError(), attempts: attempt };
      }

      const wait = policy.jitter ? jitter(delay) : delay;
      logger.warn(`${label} attempt ${attempt} failed, retrying in ${wait}ms: ${describe(err)}`, {
        attempt,
      });
      options.onRetry?.(attempt, err, wait);

      try {
        await doSleep(wait, signal);
      } catch (sleepErr) {
        if (signal?.aborted || sleepErr instanceof CancelledError) {
          return { ok: false, kind: "cancelled", error: sleepErr, attempts: attempt };
        }
        return { ok: false, kind: "permanent", error: sleepErr, attempts: attempt };
      }

      delay *= policy.backoffMultiplier;
    }
  }
}
