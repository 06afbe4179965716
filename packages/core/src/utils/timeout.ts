import { CancelledError } from '../errors';

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  run: () => Promise<T>;
  /** Aborting rejects with CancelledError without waiting for `run`. */
  signal?: AbortSignal | undefined;
}

export function abortReason(signal: AbortSignal, fallback: string): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) return reason;
  if (reason instanceof Error && reason.name !== 'AbortError') return new CancelledError(reason.message);
  return new CancelledError(fallback);
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const { signal } = input;
  if (signal?.aborted) {
    throw abortReason(signal, `${input.label} cancelled`);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  try {
    const racers: Array<Promise<T>> = [
      input.run(),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          reject(new TimeoutError(input.label, input.timeoutMs));
        }, input.timeoutMs);
      })
    ];

    if (signal) {
      racers.push(new Promise<T>((_, reject) => {
        onAbort = () => reject(abortReason(signal, `${input.label} cancelled`));
        signal.addEventListener('abort', onAbort, { once: true });
      }));
    }

    return await Promise.race(racers);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
