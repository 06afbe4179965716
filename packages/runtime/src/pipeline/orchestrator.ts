import { randomUUID } from 'node:crypto';

import {
  type AnalysisResult,
  type CheckpointSaver,
  type ComparisonResult,
  type ErrorKind,
  type Hypothesis,
  type LiteratureResult,
  type Logger,
  type PlotArtifact,
  type ProteinPrediction,
  type ReportArtifact,
  type RetryPolicy,
  type StateSnapshot,
  CancelledError,
  DEFAULT_SYSTEM_PROMPT,
  abortReason,
  classifyError,
  errorMessage
} from '@helix/core';
import type { ProteinPredictor, SequenceAnalyzer, SequenceComparator } from '@helix/analysis';
import { EngineExecutor } from '@helix/engine';

import type { PerformanceTracker } from '../metrics/performanceTracker';
import type { SessionStore } from '../session/sessionStore';
import { PIPELINE_ENTRYPOINT, PIPELINE_NODES, type PipelineCollaborators, type PipelineContext } from './nodes';
import { StageRunner } from './stageRunner';
import {
  PIPELINE_CHANNELS,
  initialPipelineState,
  type PipelineState,
  type StageName,
  type StageTransition
} from './state';

// Five nodes; anything beyond that is a routing bug.
const MAX_PIPELINE_STEPS = 10;

export interface PipelineRunInput {
  sequence: string;
  compareWith?: string | undefined;
  sessionId?: string | undefined;
  signal?: AbortSignal | undefined;
  /** Epoch milliseconds after which the run is cancelled. */
  deadline?: number | undefined;
}

interface RunSummary {
  runId: string;
  transitions: StageTransition[];
  stageAttempts: Partial<Record<StageName, number>>;
  durationMs: number;
}

export interface PipelineSuccess extends RunSummary {
  success: true;
  status: 'COMPLETED';
  analysis: AnalysisResult;
  proteins: ProteinPrediction[];
  comparison: ComparisonResult | null;
  literature: LiteratureResult;
  hypotheses: Hypothesis[];
  enrichment: string;
  artifacts: { plots: PlotArtifact[]; report: ReportArtifact };
  /**
   * Set when every stage completed but the run was not recorded on the session
   * (cancelled after the last stage, or the context write failed). The session
   * context is unchanged in that case.
   */
  sessionError: RunError | null;
}

export type RunError = { kind: ErrorKind; message: string };

export interface PipelineFailure extends RunSummary {
  success: false;
  status: 'FAILED';
  stage: StageName;
  error: RunError;
}

export type PipelineRunResult = PipelineSuccess | PipelineFailure;

export interface PipelineOrchestratorOptions {
  analyzer: SequenceAnalyzer;
  predictor: ProteinPredictor;
  comparator: SequenceComparator;
  collaborators: PipelineCollaborators;
  sessions: SessionStore;
  tracker: PerformanceTracker;
  checkpoints: CheckpointSaver<PipelineState>;
  logger: Logger;
  retry: RetryPolicy;
  collaboratorTimeoutMs: number;
  hypothesisConfidenceThreshold: number;
  systemPrompt?: string;
  now?: () => number;
  createId?: () => string;
  random?: () => number;
}

/** Combines the caller's signal and the deadline into one signal for the run. */
function linkAbort(parent: AbortSignal | undefined, deadline: number | undefined, now: number) {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent?.reason);
  let timer: ReturnType<typeof setTimeout> | undefined;

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  if (deadline !== undefined && !controller.signal.aborted) {
    const remaining = deadline - now;
    const expire = () => controller.abort(new CancelledError('Pipeline deadline exceeded'));
    if (remaining <= 0) expire();
    else timer = setTimeout(expire, remaining);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    }
  };
}

/**
 * Runs the analysis pipeline as a step graph:
 * STARTED → ANALYZING → (PREDICTING | SKIPPED_NO_ORF) → ENRICHING → VISUALIZING
 * → REPORTING → COMPLETED, or FAILED from any step. Every outcome, including
 * cancellation and unexpected errors, comes back as a result value.
 */
export class PipelineOrchestrator {
  private readonly executor = new EngineExecutor<PipelineState, PipelineContext>({
    channels: PIPELINE_CHANNELS,
    initialState: initialPipelineState,
    nodes: PIPELINE_NODES
  });
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly createId: () => string;

  public constructor(private readonly options: PipelineOrchestratorOptions) {
    this.logger = options.logger.child({ component: 'pipeline' });
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  public async run(input: PipelineRunInput): Promise<PipelineRunResult> {
    const runId = this.createId();
    const startedAt = this.now();
    const logger = this.logger.child({ runId, sessionId: input.sessionId ?? null });
    const { signal, dispose } = linkAbort(input.signal, input.deadline, startedAt);

    let currentStage: StageName = 'sequence_analysis';
    const stages = new StageRunner({
      tracker: this.options.tracker,
      retry: this.options.retry,
      collaboratorTimeoutMs: this.options.collaboratorTimeoutMs,
      logger,
      random: this.options.random,
      onStageStart: (stage) => {
        currentStage = stage;
      }
    });

    const context: PipelineContext = {
      runId,
      sequence: input.sequence,
      compareWith: input.compareWith,
      signal,
      stages,
      analyzer: this.options.analyzer,
      predictor: this.options.predictor,
      comparator: this.options.comparator,
      collaborators: this.options.collaborators,
      hypothesisConfidenceThreshold: this.options.hypothesisConfidenceThreshold,
      systemPrompt: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      now: this.now,
      logger
    };

    logger.info({ length: input.sequence.length, compare: input.compareWith !== undefined }, 'Pipeline started');

    try {
      const final = await this.executor.invoke(
        { transitions: [{ status: 'STARTED', at: startedAt }] },
        context,
        {
          threadId: runId,
          saver: this.options.checkpoints,
          entrypoint: PIPELINE_ENTRYPOINT,
          signal,
          logger,
          maxSteps: MAX_PIPELINE_STEPS
        }
      );

      const values = final.values;
      if (values.status === 'FAILED' && values.failure) {
        return this.failure(runId, startedAt, values, values.failure.stage, values.failure.kind, values.failure.message, false);
      }

      const completed = this.completed(runId, startedAt, values);
      if (!completed) {
        throw new Error(`Pipeline ended in ${values.status} without a complete result`);
      }

      // COMPLETED is terminal: problems after the last stage are reported on the
      // result without turning the run into a failure.
      if (signal.aborted) {
        completed.sessionError = { kind: 'cancelled', message: abortReason(signal, 'Pipeline cancelled').message };
      } else if (input.sessionId) {
        completed.sessionError = await this.recordOnSession(input.sessionId, completed, logger);
      }

      logger.info({ durationMs: completed.durationMs, stageAttempts: completed.stageAttempts }, 'Pipeline completed');
      return completed;
    } catch (error) {
      const latest = await this.options.checkpoints.getCheckpoint(runId);
      const values = latest?.values ?? initialPipelineState();
      const kind = classifyError(error);
      logger.error({ stage: currentStage, kind, error: errorMessage(error) }, 'Pipeline aborted');
      return this.failure(runId, startedAt, values, currentStage, kind, errorMessage(error), true);
    } finally {
      dispose();
    }
  }

  /** Checkpoint history of one run, oldest first. */
  public async checkpointHistory(runId: string): Promise<StateSnapshot<PipelineState>[]> {
    return this.options.checkpoints.getCheckpointHistory(runId);
  }

  private completed(runId: string, startedAt: number, values: PipelineState): PipelineSuccess | null {
    const { analysis, literature, enrichment, report } = values;
    if (values.status !== 'COMPLETED' || !analysis || !literature || enrichment === null || !report) {
      return null;
    }

    return {
      success: true,
      status: 'COMPLETED',
      runId,
      analysis,
      proteins: values.proteins,
      comparison: values.comparison,
      literature,
      hypotheses: values.hypotheses,
      enrichment,
      artifacts: { plots: values.plots, report },
      transitions: values.transitions,
      stageAttempts: values.stageAttempts,
      durationMs: this.now() - startedAt,
      sessionError: null
    };
  }

  private failure(
    runId: string,
    startedAt: number,
    values: PipelineState,
    stage: StageName,
    kind: ErrorKind,
    message: string,
    appendFailed: boolean
  ): PipelineFailure {
    const transitions = appendFailed
      ? [...values.transitions, { status: 'FAILED' as const, at: this.now() }]
      : values.transitions;

    return {
      success: false,
      status: 'FAILED',
      runId,
      stage,
      error: { kind, message },
      transitions,
      stageAttempts: values.stageAttempts,
      durationMs: this.now() - startedAt
    };
  }

  /** Writes `last_sequence` and `last_run` in one session update. */
  private async recordOnSession(sessionId: string, run: PipelineSuccess, logger: Logger): Promise<RunError | null> {
    try {
      const updated = await this.options.sessions.updateContext(sessionId, {
        last_sequence: run.analysis.sequence,
        last_run: {
          runId: run.runId,
          completedAt: new Date(this.now()).toISOString(),
          sequenceType: run.analysis.sequenceType,
          length: run.analysis.length,
          gcPercent: run.analysis.gcPercent,
          orfCount: run.analysis.orfs.length,
          motifCount: run.analysis.motifs.length,
          hypothesisCount: run.hypotheses.length,
          reportPath: run.artifacts.report.reportPath
        }
      });
      if (updated.ok) return null;

      logger.warn({ error: updated.error.message }, 'Run completed for an unknown session');
      return { kind: updated.error.kind, message: updated.error.message };
    } catch (error) {
      const kind = classifyError(error);
      logger.error({ kind, error: errorMessage(error) }, 'Failed to record run on session');
      return { kind, message: errorMessage(error) };
    }
  }
}
