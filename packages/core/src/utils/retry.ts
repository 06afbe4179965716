import { abortReason } from './timeout';
import { isTransientError } from './classify';

export interface RetryPolicy {
  /** Retries after the first attempt; `maxRetries: 2` allows three attempts. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface RetryAttemptFailure {
  attempt: number;
  error: unknown;
  /** Delay before the next attempt, or null when no attempt follows. */
  delayMs: number | null;
}

interface RetryIdempotentInput<T> extends RetryPolicy {
  run: (attempt: number) => Promise<T>;
  isRetryable?: (error: unknown) => boolean;
  onAttemptFailed?: (failure: RetryAttemptFailure) => void;
  signal?: AbortSignal | undefined;
  random?: () => number;
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal, 'Retry backoff cancelled'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal, 'Retry backoff cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function nextDelayMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const expo = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * (policy.jitterMs + 1)) : 0;
  return Math.min(expo + jitter, policy.maxDelayMs);
}

/**
 * Runs `run` until it succeeds, the error is not retryable, or the attempt budget
 * is spent. Attempts are numbered from 1.
 */
export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  const isRetryable = input.isRetryable ?? isTransientError;

  for (let attempt = 0; attempt <= input.maxRetries; attempt += 1) {
    if (input.signal?.aborted) {
      throw abortReason(input.signal, 'Retry cancelled');
    }

    try {
      return await input.run(attempt + 1);
    } catch (error) {
      const exhausted = attempt >= input.maxRetries;
      if (exhausted || !isRetryable(error)) {
        input.onAttemptFailed?.({ attempt: attempt + 1, error, delayMs: null });
        throw error;
      }

      const delayMs = nextDelayMs(input, attempt, input.random);
      input.onAttemptFailed?.({ attempt: attempt + 1, error, delayMs });
      await sleep(delayMs, input.signal);
    }
  }

  throw new Error('retryIdempotent exhausted unexpectedly');
}
