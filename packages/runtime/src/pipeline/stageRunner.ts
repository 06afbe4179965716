import {
  type Logger,
  type RetryPolicy,
  classifyError,
  errorMessage,
  retryIdempotent,
  withTimeout
} from '@helix/core';

import type { ExecutionUsage, PerformanceTracker } from '../metrics/performanceTracker';
import type { StageFailure, StageName } from './state';

export interface StageOutput<T> {
  value: T;
  usage?: ExecutionUsage;
}

export type StageOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; failure: StageFailure; attempts: number };

export interface StageRunnerOptions {
  tracker: PerformanceTracker;
  retry: RetryPolicy;
  collaboratorTimeoutMs: number;
  logger: Logger;
  random?: () => number;
  /** Called before the first attempt of every stage. */
  onStageStart?: (stage: StageName) => void;
}

export interface RunStageInput<T> {
  stage: StageName;
  /** External collaborator calls also run under the collaborator timeout. */
  external: boolean;
  signal: AbortSignal;
  /** Collaborators the stage invokes, recorded on every attempt. */
  toolCalls?: readonly string[];
  run: (signal: AbortSignal) => Promise<StageOutput<T>>;
}

/**
 * The single retry wrapper every pipeline stage goes through. Each attempt is
 * one tracked execution; only transient failures are retried.
 */
export class StageRunner {
  public constructor(private readonly options: StageRunnerOptions) { }

  public async run<T>(input: RunStageInput<T>): Promise<StageOutcome<T>> {
    const { tracker, retry, collaboratorTimeoutMs, logger } = this.options;
    let attempts = 0;
    this.options.onStageStart?.(input.stage);

    const attempt = (): Promise<StageOutput<T>> => input.external
      ? withTimeout({
        timeoutMs: collaboratorTimeoutMs,
        label: input.stage,
        signal: input.signal,
        run: () => input.run(input.signal)
      })
      : input.run(input.signal);

    try {
      const output = await retryIdempotent({
        ...retry,
        signal: input.signal,
        random: this.options.random,
        run: (attemptNumber) => {
          attempts = attemptNumber;
          return tracker.record(input.stage, attempt, (result) => result.usage, input.toolCalls);
        },
        onAttemptFailed: ({ attempt: failedAttempt, error, delayMs }) => {
          logger.warn(
            { stage: input.stage, attempt: failedAttempt, delayMs, error: errorMessage(error) },
            delayMs === null ? 'Stage failed' : 'Stage attempt failed, retrying'
          );
        }
      });
      return { ok: true, value: output.value, attempts };
    } catch (error) {
      return {
        ok: false,
        attempts,
        failure: { stage: input.stage, kind: classifyError(error), message: errorMessage(error) }
      };
    }
  }
}
