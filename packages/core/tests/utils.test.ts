import { describe, expect, it, vi } from 'vitest';

import {
  InvalidSequenceError,
  KeyedMutex,
  PermanentCollaboratorError,
  TimeoutError,
  TransientCollaboratorError,
  assertJsonValue,
  classifyError,
  err,
  nextDelayMs,
  ok,
  retryIdempotent,
  unwrap,
  withTimeout
} from '../src/index';

const policy = { maxRetries: 2, baseDelayMs: 75, maxDelayMs: 2000, jitterMs: 25 };

describe('nextDelayMs', () => {
  it('backs off exponentially with bounded jitter', () => {
    expect(nextDelayMs(policy, 0, () => 0)).toBe(75);
    expect(nextDelayMs(policy, 1, () => 0)).toBe(150);
    expect(nextDelayMs(policy, 0, () => 0.99)).toBe(100);
    expect(nextDelayMs(policy, 10, () => 0)).toBe(2000);
  });
});

describe('retryIdempotent', () => {
  const instant = { ...policy, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

  it('retries transient failures until one succeeds', async () => {
    const run = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new TransientCollaboratorError('literature', 'unavailable');
      return 'found';
    });
    const failures: Array<{ attempt: number; delayMs: number | null }> = [];

    const result = await retryIdempotent({
      ...instant,
      run,
      onAttemptFailed: ({ attempt, delayMs }) => failures.push({ attempt, delayMs })
    });

    expect(result).toBe('found');
    expect(run).toHaveBeenCalledTimes(3);
    expect(failures).toEqual([
      { attempt: 1, delayMs: 0 },
      { attempt: 2, delayMs: 0 }
    ]);
  });

  it('gives up immediately on permanent failures', async () => {
    const run = vi.fn(async () => {
      throw new PermanentCollaboratorError('reports', 'bad template');
    });
    const failures: Array<number | null> = [];

    await expect(
      retryIdempotent({ ...instant, run, onAttemptFailed: ({ delayMs }) => failures.push(delayMs) })
    ).rejects.toThrow('reports: bad template');
    expect(run).toHaveBeenCalledTimes(1);
    expect(failures).toEqual([null]);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const run = vi.fn(async () => 'never');

    await expect(retryIdempotent({ ...instant, run, signal: controller.signal })).rejects.toThrow('Retry cancelled');
    expect(run).not.toHaveBeenCalled();
  });
});

describe('withTimeout', () => {
  it('rejects slow work with a TimeoutError', async () => {
    const pending = withTimeout({ timeoutMs: 5, label: 'slow', run: () => new Promise<string>(() => undefined) });

    await expect(pending).rejects.toThrow(new TimeoutError('slow', 5));
    await expect(pending).rejects.toThrow('slow timed out after 5ms');
  });

  it('returns the value of fast work', async () => {
    await expect(withTimeout({ timeoutMs: 1000, label: 'fast', run: async () => 42 })).resolves.toBe(42);
  });
});

describe('classifyError', () => {
  it('uses the taxonomy kind when there is one', () => {
    expect(classifyError(new InvalidSequenceError('Sequence is empty'))).toBe('validation');
    expect(classifyError(new TransientCollaboratorError('llm', 'overloaded'))).toBe('transient');
    expect(classifyError(new TimeoutError('llm', 10))).toBe('transient');
  });

  it('judges other errors by their message', () => {
    expect(classifyError(new Error('read ECONNRESET'))).toBe('transient');
    expect(classifyError(new Error('HTTP 503 from upstream'))).toBe('transient');
    expect(classifyError(new Error('unexpected token'))).toBe('permanent');
    expect(classifyError('plain string')).toBe('permanent');
  });
});

describe('KeyedMutex', () => {
  it('runs work for one key in call order and releases the key', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push('a1');
      }),
      mutex.runExclusive('a', async () => {
        order.push('a2');
      }),
      mutex.runExclusive('b', async () => {
        order.push('b1');
      })
    ]);

    expect(order).toEqual(['b1', 'a1', 'a2']);
    expect(mutex.size).toBe(0);
  });

  it('releases the key when work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('a', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('a', async () => 'next')).resolves.toBe('next');
  });
});

describe('assertJsonValue', () => {
  it('accepts plain JSON data', () => {
    expect(() => assertJsonValue('ctx', { a: [1, 'two', null, { b: true }] })).not.toThrow();
  });

  it('names the path of the first value that is not JSON', () => {
    expect(() => assertJsonValue('ctx', { fn: () => 1 })).toThrow('ctx.fn: value must be a JSON-serializable type');
    expect(() => assertJsonValue('ctx', { list: [1, Number.NaN] })).toThrow('ctx.list[1]: numbers must be finite');
    expect(() => assertJsonValue('ctx', new Map())).toThrow('Got: object');
  });
});

describe('Result', () => {
  it('unwraps values and throws carried errors', () => {
    expect(unwrap(ok(3))).toBe(3);
    expect(() => unwrap(err(new Error('nope')))).toThrow('nope');
  });
});
